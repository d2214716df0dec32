"use client"

import { ReactNode } from "react"
import { Dog } from "lucide-react"

interface DashboardLayoutProps {
  children: ReactNode
}

export function DashboardLayout({ children }: DashboardLayoutProps) {
  return (
    <div className="min-h-screen bg-[#1a1a2e] text-[#eee] relative">
      <header className="flex items-center justify-center gap-2 py-4">
        <Dog className="w-6 h-6" />
        <h1 className="text-xl font-bold">DogWatch</h1>
      </header>
      <main className="px-4 pb-6 max-w-4xl mx-auto">
        {children}
      </main>
    </div>
  )
}
