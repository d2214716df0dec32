/**
 * DogWatch runtime — builds the pipeline from env and runs it inside the
 * Next.js server process (see instrumentation.ts).
 *
 * Without DOGWATCH_SOURCE_COMMAND nothing starts; the dashboard still serves
 * whatever status file and frames are on disk.
 */

import { AlertSound } from "./alert-sound";
import { DetectionAnalyzer } from "./analyzer";
import { describeConfig, loadDogWatchConfig } from "./config";
import type { DogWatchConfig } from "./config";
import { DetectionLoop } from "./detection-loop";
import { FatalStorageError, errorMessage } from "./errors";
import { FrameStore } from "./frame-store";
import { HealthHeartbeat } from "./heartbeat";
import { NtfyTransport } from "./ntfy";
import { SidecarInferenceSource } from "./sidecar-source";
import { loadLabels } from "./ssd-output";
import { StatusPublisher, idleStatus, readStatusSnapshot, removeStaleStatusTemps } from "./status";
import { NotificationThrottle } from "./throttle";
import type { InferenceSource, NotificationTransport } from "./types";

export interface DogWatchRuntime {
  config: DogWatchConfig;
  loop: DetectionLoop;
  heartbeat: HealthHeartbeat;
  source: InferenceSource;
  status: StatusPublisher;
  /** Stops after the cycle in progress, then closes the source and flushes status. */
  shutdown(): Promise<void>;
}

/** Replacements for the parts that reach outside the process. */
export interface DogWatchRuntimeOverrides {
  source?: InferenceSource;
  transport?: NotificationTransport;
  /** Install SIGINT/SIGTERM handlers. Default true. */
  handleSignals?: boolean;
  exit?: (code: number) => void;
}

let started: DogWatchRuntime | null = null;

async function restoreLastDogSeen(statusFile: string): Promise<string | null> {
  try {
    const previous = await readStatusSnapshot(statusFile);
    return previous.last_dog_seen;
  } catch (e) {
    console.warn("[DogWatch] ignoring unreadable status file:", errorMessage(e));
    return null;
  }
}

function startSidecar(command: string): SidecarInferenceSource {
  const sidecar = new SidecarInferenceSource(command);
  sidecar.start();
  return sidecar;
}

export async function startDogWatch(
  config: DogWatchConfig = loadDogWatchConfig(),
  overrides: DogWatchRuntimeOverrides = {}
): Promise<DogWatchRuntime | null> {
  if (started) return started;
  if (!config.sourceCommand) {
    console.warn("[DogWatch] DOGWATCH_SOURCE_COMMAND not set, detection pipeline not started");
    return null;
  }
  const exit = overrides.exit ?? ((code: number) => process.exit(code));

  console.log("[DogWatch] initializing:", describeConfig(config));

  const labels = loadLabels(config.labelsPath);
  const analyzer = new DetectionAnalyzer({
    dogLabel: config.dogLabel,
    humanLabel: config.humanLabel,
    dogThreshold: config.dogThreshold,
    humanThreshold: config.humanThreshold,
    labels,
    roi: config.roi,
    roiOverlapThreshold: config.roiOverlapThreshold,
  });

  const frameStore = new FrameStore({ dir: config.frameDir, capacity: config.maxKeptFrames });
  await frameStore.init();

  const staleTemps = await removeStaleStatusTemps(config.statusFile);
  if (staleTemps > 0) {
    console.log(`[DogWatch] removed ${staleTemps} stale status temp file(s)`);
  }
  const lastDogSeen = await restoreLastDogSeen(config.statusFile);
  const status = new StatusPublisher({
    statusFile: config.statusFile,
    initial: idleStatus(lastDogSeen, new Date()),
  });

  const transport = overrides.transport ?? new NtfyTransport({ server: config.ntfyServer });
  const throttle = new NotificationThrottle({
    transport,
    topic: config.alertTopic,
    cooldownMs: config.notifyCooldownMs,
  });
  const heartbeat = new HealthHeartbeat({
    transport,
    topic: config.healthTopic,
    intervalMs: config.heartbeatIntervalMs,
  });

  const alertSound = new AlertSound({
    enabled: config.audioEnabled,
    device: config.audioDevice,
    soundPath: config.alertSoundPath,
  });
  await alertSound.verify();

  const source = overrides.source ?? startSidecar(config.sourceCommand);

  const loop = new DetectionLoop(
    { source, analyzer, frameStore, throttle, status, alertSound },
    {
      intervalMs: config.captureIntervalMs,
      acquireTimeoutMs: config.acquireTimeoutMs,
      maxConsecutiveWriteFailures: config.maxConsecutiveWriteFailures,
      lastDogSeen,
    }
  );

  heartbeat.start();
  // Settles with the error the loop ended on, or null after a clean stop.
  const finished: Promise<unknown> = loop.run().then(
    () => null,
    (e: unknown) => e
  );

  let stopping: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (!stopping) {
      stopping = (async () => {
        loop.stop();
        heartbeat.stop();
        await finished;
        source.close();
        await status.flush();
        if (started === runtime) started = null;
      })();
    }
    return stopping;
  };

  const runtime: DogWatchRuntime = { config, loop, heartbeat, source, status, shutdown };
  started = runtime;

  if (overrides.handleSignals ?? true) {
    for (const sig of ["SIGINT", "SIGTERM"] as const) {
      process.once(sig, () => {
        console.log(`[DogWatch] ${sig} received, shutting down after the current cycle`);
        shutdown()
          .catch((e: unknown) => console.error("[DogWatch] shutdown error:", errorMessage(e)))
          .finally(() => exit(0));
      });
    }
  }

  finished
    .then((e) => {
      if (e === null) return;
      if (e instanceof FatalStorageError) {
        console.error("[DogWatch] fatal:", e.message, "- exiting for supervisor restart");
      } else {
        console.error("[DogWatch] detection loop crashed:", errorMessage(e));
      }
      return shutdown().finally(() => exit(1));
    })
    .catch((e: unknown) => {
      console.error("[DogWatch] shutdown error:", errorMessage(e));
      exit(1);
    });

  console.log("[DogWatch] running, monitoring for dogs on couch");
  return runtime;
}
