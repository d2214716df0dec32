"use client"

import { useState, useEffect, useCallback } from "react"
import { DashboardLayout } from "@/components/dashboard-layout"
import { ShieldAlert, Eye, Dog, Clock, RefreshCw, ImageOff } from "lucide-react"
import type { LucideIcon } from "lucide-react"
import { isSystemStatus } from "@/lib/dogwatch/types"
import type { FrameListing, SystemStatus } from "@/lib/dogwatch/types"

const REFRESH_MS = 3000

type Banner = { text: string; className: string; Icon: LucideIcon }

function bannerFor(status: SystemStatus | null): Banner {
  if (!status) {
    return { text: "Loading...", className: "bg-[#636e72]", Icon: Eye }
  }
  if (status.privacy_mode) {
    return { text: "Privacy mode - person detected", className: "bg-[#d63031]", Icon: ShieldAlert }
  }
  if (status.dog_detected) {
    const count = status.dog_count || 1
    const word = count === 1 ? "dog" : "dogs"
    return { text: `${count} ${word} on couch!`, className: "bg-[#2d6a4f]", Icon: Dog }
  }
  return { text: "Monitoring - no dog detected", className: "bg-[#636e72]", Icon: Eye }
}

export default function DogWatchDashboardPage() {
  const [status, setStatus] = useState<SystemStatus | null>(null)
  const [frames, setFrames] = useState<FrameListing[]>([])
  const [loading, setLoading] = useState(true)
  const [error, setError] = useState<string | null>(null)
  const [cacheBust, setCacheBust] = useState(0)

  const refresh = useCallback(async () => {
    setLoading(true)
    try {
      const [statusRes, framesRes] = await Promise.all([
        fetch("/api/status", { cache: "no-store" }),
        fetch("/api/frames", { cache: "no-store" }),
      ])
      if (!statusRes.ok) throw new Error("Failed to load status")
      if (!framesRes.ok) throw new Error("Failed to load frames")
      const statusData: unknown = await statusRes.json()
      const framesData: unknown = await framesRes.json()
      if (!isSystemStatus(statusData)) throw new Error("Malformed status")
      setStatus(statusData)
      setFrames(Array.isArray(framesData) ? framesData : [])
      setCacheBust(Date.now())
      setError(null)
    } catch (e) {
      setError(e instanceof Error ? e.message : "Unknown error")
    } finally {
      setLoading(false)
    }
  }, [])

  useEffect(() => {
    refresh()
    const interval = setInterval(refresh, REFRESH_MS)
    return () => clearInterval(interval)
  }, [refresh])

  const banner = bannerFor(status)

  return (
    <DashboardLayout>
      <div className="space-y-4">
        <div className={`flex items-center justify-center gap-2 p-3 rounded-lg font-bold ${banner.className}`}>
          <banner.Icon className="w-5 h-5" />
          {banner.text}
        </div>

        <div className="flex items-center justify-between text-sm text-[#aaa]">
          <div className="flex items-center gap-2">
            <Clock className="w-4 h-4" />
            {status?.last_dog_seen ? `Last seen: ${status.last_dog_seen}` : "No dog sightings yet"}
          </div>
          <button
            onClick={refresh}
            disabled={loading}
            className="flex items-center gap-2 px-3 py-1.5 bg-white/10 hover:bg-white/15 rounded-lg border border-white/5 transition-colors disabled:opacity-50"
          >
            <RefreshCw className={`w-4 h-4 ${loading ? "animate-spin" : ""}`} />
            Refresh
          </button>
        </div>

        {error && (
          <div className="p-3 bg-white/5 border border-white/10 rounded-lg text-red-400 text-sm">
            {error}
          </div>
        )}

        {frames.length === 0 ? (
          <div className="bg-white/5 rounded-lg border border-white/5 p-12 text-center text-[#888]">
            <ImageOff className="w-10 h-10 mx-auto mb-3" />
            No dog frames captured yet.
          </div>
        ) : (
          <div className="grid grid-cols-1 sm:grid-cols-2 gap-3">
            {frames.map((f) => (
              <div key={f.name}>
                <img
                  src={`/frames/${encodeURIComponent(f.name)}?${cacheBust}`}
                  alt={`Dog detected at ${f.time}`}
                  className="w-full rounded-lg"
                />
                <div className="text-center text-[#888] text-xs mt-1">{f.time}</div>
              </div>
            ))}
          </div>
        )}
      </div>
    </DashboardLayout>
  )
}
