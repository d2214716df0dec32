import { NextResponse } from "next/server"
import { listFrames, loadDogWatchConfig, parseFrameLimit } from "@/lib/dogwatch"

export const dynamic = "force-dynamic"

export async function GET(request: Request) {
  try {
    const { frameDir, maxKeptFrames } = loadDogWatchConfig()
    const limit = parseFrameLimit(new URL(request.url).searchParams.get("limit"), maxKeptFrames)
    const frames = await listFrames(frameDir, limit)
    return NextResponse.json(frames, { headers: { "Cache-Control": "no-store" } })
  } catch (e) {
    console.error("GET frames:", e)
    return NextResponse.json({ error: "Failed to list frames" }, { status: 500 })
  }
}
