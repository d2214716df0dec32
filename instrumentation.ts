export async function register() {
  if (process.env.NEXT_RUNTIME === "nodejs") {
    const { startDogWatch } = await import("./lib/dogwatch/runtime")
    await startDogWatch()
  }
}
