export const TYPING_INTERVAL_MS = 30;

export function* typingFrames(text: string): Generator<string> {
  let current = "";
  for (const word of text.split(/\s+/)) {
    if (!word) continue;
    current += `${word} `;
    yield current.trim();
  }
}
