/**
 * Alert sound — non-blocking aplay on the I2S speaker
 *
 * Off unless DOGWATCH_AUDIO_ENABLED=1. `verify()` disables playback when
 * `aplay -l` lists no sound card. While one clip is playing, further
 * requests are dropped rather than queued.
 */

import { execFile, spawn } from "child_process";
import { access } from "fs/promises";
import { errorMessage } from "./errors";

export interface AlertSoundOptions {
  enabled: boolean;
  device: string;
  soundPath: string;
}

function listSoundCards(): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile("aplay", ["-l"], { timeout: 5000 }, (err, stdout) => {
      if (err) reject(err);
      else resolve(stdout);
    });
  });
}

export class AlertSound {
  private enabled: boolean;
  private readonly device: string;
  private readonly soundPath: string;
  private isPlaying = false;

  constructor(options: AlertSoundOptions) {
    this.enabled = options.enabled;
    this.device = options.device;
    this.soundPath = options.soundPath;
  }

  async verify(): Promise<boolean> {
    if (!this.enabled) {
      console.log("[AlertSound] disabled via config");
      return false;
    }
    try {
      const out = await listSoundCards();
      if (!out.toLowerCase().includes("card")) {
        console.warn("[AlertSound] no audio devices found via aplay -l, disabling");
        this.enabled = false;
      } else {
        console.log("[AlertSound] audio devices:", out.trim());
      }
    } catch (e) {
      console.warn("[AlertSound] could not verify audio device, disabling:", errorMessage(e));
      this.enabled = false;
    }
    return this.enabled;
  }

  async play(): Promise<void> {
    if (!this.enabled || this.isPlaying) return;

    try {
      await access(this.soundPath);
    } catch {
      console.warn("[AlertSound] sound file not found:", this.soundPath);
      return;
    }

    try {
      const child = spawn("aplay", ["-D", this.device, this.soundPath], {
        stdio: "ignore",
        detached: true,
      });
      this.isPlaying = true;

      child.on("error", (err) => {
        console.warn("[AlertSound] error:", err.message);
        this.isPlaying = false;
      });
      child.on("close", () => {
        this.isPlaying = false;
      });
      child.unref();
    } catch (e) {
      console.warn("[AlertSound] spawn failed:", errorMessage(e));
      this.isPlaying = false;
    }
  }
}
