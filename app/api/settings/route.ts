import { NextResponse } from "next/server";
import { loadConfig, publicSettings } from "@/lib/config";
import { errorMessage } from "@/lib/errors";

export const dynamic = "force-dynamic";

export async function GET() {
  try {
    return NextResponse.json(publicSettings(loadConfig(process.env)));
  } catch (error) {
    return NextResponse.json({ error: errorMessage(error) }, { status: 500 });
  }
}
