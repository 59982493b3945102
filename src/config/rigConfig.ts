/**
 * Rig configuration: defaults, overrides and environment.
 */

export interface PhonemeTimingConfig {
  /** Transition length of every emitted viseme keyframe */
  transitionMs: number;
  /** Minimum spacing between accepted viseme keyframes */
  cooldownMs: number;
  /** Transition length of the trailing return-to-neutral keyframe */
  trailingTransitionMs: number;
}

export interface RigConfig {
  /** Base URL of the sequence store / backend */
  apiBaseUrl: string;
  /** Sprite playback rate */
  fps: number;
  /** Opacity crossfade between presentation buffers */
  crossfadeMs: number;
  /** How often the timeline resolves the effective target state */
  resolutionIntervalMs: number;
  phoneme: PhonemeTimingConfig;
  /** Transition length given to planner-generated expression keyframes */
  emotionTransitionMs: number;
  /** Transition length given to keyframes added by hand */
  manualTransitionMs: number;
}

export const DEFAULT_RIG_CONFIG: RigConfig = {
  apiBaseUrl: 'http://localhost:8000',
  fps: 24,
  crossfadeMs: 150,
  resolutionIntervalMs: 50,
  phoneme: {
    transitionMs: 500,
    cooldownMs: 175,
    trailingTransitionMs: 300,
  },
  emotionTransitionMs: 300,
  manualTransitionMs: 300,
};

export type RigConfigOverrides = Partial<Omit<RigConfig, 'phoneme'>> & {
  phoneme?: Partial<PhonemeTimingConfig>;
};

function positiveNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    console.warn(`[rigConfig] Ignoring non-positive numeric setting "${raw}"`);
    return undefined;
  }
  return n;
}

/**
 * Read overrides from the environment.
 * RIG_API_BASE_URL, RIG_FPS, RIG_CROSSFADE_MS, RIG_RESOLUTION_INTERVAL_MS
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): RigConfigOverrides {
  const out: RigConfigOverrides = {};
  if (env.RIG_API_BASE_URL) out.apiBaseUrl = env.RIG_API_BASE_URL.replace(/\/+$/, '');
  const fps = positiveNumber(env.RIG_FPS);
  if (fps !== undefined) out.fps = fps;
  const crossfadeMs = positiveNumber(env.RIG_CROSSFADE_MS);
  if (crossfadeMs !== undefined) out.crossfadeMs = crossfadeMs;
  const resolutionIntervalMs = positiveNumber(env.RIG_RESOLUTION_INTERVAL_MS);
  if (resolutionIntervalMs !== undefined) out.resolutionIntervalMs = resolutionIntervalMs;
  return out;
}

export function resolveRigConfig(...layers: RigConfigOverrides[]): RigConfig {
  let config: RigConfig = { ...DEFAULT_RIG_CONFIG, phoneme: { ...DEFAULT_RIG_CONFIG.phoneme } };
  for (const layer of layers) {
    const { phoneme, ...rest } = layer;
    config = {
      ...config,
      ...rest,
      phoneme: { ...config.phoneme, ...phoneme },
    };
  }
  return config;
}

/** Defaults, then environment, then explicit overrides. */
export function loadRigConfig(overrides: RigConfigOverrides = {}): RigConfig {
  return resolveRigConfig(configFromEnv(), overrides);
}
