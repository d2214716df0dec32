import { NextResponse } from "next/server"
import { loadDogWatchConfig, readStatusSnapshot } from "@/lib/dogwatch"

export const dynamic = "force-dynamic"

export async function GET() {
  try {
    const { statusFile } = loadDogWatchConfig()
    const status = await readStatusSnapshot(statusFile)
    return NextResponse.json(status, { headers: { "Cache-Control": "no-store" } })
  } catch (e) {
    console.error("GET status:", e)
    return NextResponse.json({ error: "Failed to read status" }, { status: 500 })
  }
}
