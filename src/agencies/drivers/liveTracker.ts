/**
 * Live tracker adapter
 *
 * Turns continuous face-tracking measurements into discrete rig states.
 * Every boundary has an enter and an exit threshold so a measurement hovering
 * near one does not flip the state on each sample.
 */

import type { ExpressionId, PoseId, RigState } from '../rig/types';
import { NEUTRAL_CENTER, sameState, stateKey } from '../rig/types';
import { errorMessage } from '../rig/errors';
import type { RigTargetSink } from '../timeline/timelineScheduler';

/** Head rotation in degrees. Positive pitch looks down, positive yaw/roll turns right. */
export interface HeadAngles {
  pitch: number;
  yaw: number;
  roll: number;
}

export interface TrackerSample extends HeadAngles {
  /** Lip gap over mouth width */
  mouthOpen: number;
  /** Mouth width over face width */
  mouthWide: number;
}

export const TRACKER_THRESHOLDS = {
  horizontalEnter: 15,
  horizontalExit: 8,
  pitchEnter: 12,
  pitchExit: 6,
  mouthOpenEnter: 0.7,
  mouthOpenExit: 0.5,
  smileSoftEnter: 0.4,
  smileSoftExit: 0.38,
  smileBigEnter: 0.46,
  smileBigExit: 0.42,
} as const;

function normalizeDelta(angle: number): number {
  let delta = angle;
  while (delta > 180) delta -= 360;
  while (delta < -180) delta += 360;
  return delta;
}

function discretizePose(sample: HeadAngles, current: RigState, baseline: HeadAngles | null): PoseId {
  // Without a baseline there is no neutral head position to measure from
  if (!baseline) return 'center';

  const pitch = normalizeDelta(sample.pitch - baseline.pitch);
  const yaw = normalizeDelta(sample.yaw - baseline.yaw);
  const roll = normalizeDelta(sample.roll - baseline.roll);

  const inCenter = current.pose === 'center';
  const horizontalThreshold = inCenter ? TRACKER_THRESHOLDS.horizontalEnter : TRACKER_THRESHOLDS.horizontalExit;
  const pitchThreshold = inCenter ? TRACKER_THRESHOLDS.pitchEnter : TRACKER_THRESHOLDS.pitchExit;

  const horizontal = Math.max(Math.abs(yaw), Math.abs(roll));
  if (horizontal > Math.abs(pitch) && horizontal > horizontalThreshold) {
    const direction = Math.abs(yaw) > Math.abs(roll) ? yaw : roll;
    return direction > 0 ? 'tilt_right_small' : 'tilt_left_small';
  }
  if (Math.abs(pitch) > pitchThreshold) {
    return pitch > 0 ? 'nod_down_small' : 'nod_up_small';
  }
  return 'center';
}

/**
 * Head pitch distorts both mouth ratios: looking down compresses the lip gap,
 * any tilt widens the apparent mouth.
 */
function discretizeExpression(sample: TrackerSample, current: RigState, relativePitch: number): ExpressionId {
  const down = Math.max(0, relativePitch / 10);
  const tilt = down + Math.max(0, -relativePitch / 10);

  const openEnter = Math.max(0.15, TRACKER_THRESHOLDS.mouthOpenEnter - down * 0.8);
  const openExit = Math.max(0.1, TRACKER_THRESHOLDS.mouthOpenExit - down * 0.6);
  const softEnter = TRACKER_THRESHOLDS.smileSoftEnter + tilt * 0.05;
  const softExit = TRACKER_THRESHOLDS.smileSoftExit + tilt * 0.04;
  const bigEnter = TRACKER_THRESHOLDS.smileBigEnter + tilt * 0.06;
  const bigExit = TRACKER_THRESHOLDS.smileBigExit + tilt * 0.05;

  const speaking = current.expr === 'speaking_ah';
  const smiling = current.expr === 'happy_soft' || current.expr === 'happy_big';

  // An open mouth outranks a smile
  if (sample.mouthOpen > (speaking ? openExit : openEnter)) return 'speaking_ah';
  if (sample.mouthWide > (smiling ? softExit : softEnter)) {
    return sample.mouthWide > (current.expr === 'happy_big' ? bigExit : bigEnter) ? 'happy_big' : 'happy_soft';
  }
  return 'neutral';
}

export function discretizeTrackerSample(
  sample: TrackerSample,
  current: RigState,
  baseline: HeadAngles | null
): RigState {
  const relativePitch = baseline ? normalizeDelta(sample.pitch - baseline.pitch) : 0;
  return {
    expr: discretizeExpression(sample, current, relativePitch),
    pose: discretizePose(sample, current, baseline),
  };
}

export interface LiveTrackerDriver {
  /** Take `sample` as the neutral head position, or the next pushed sample when omitted. */
  calibrate: (sample?: HeadAngles) => void;
  /** Discretize one measurement; a changed state is forwarded to the sink. */
  push: (sample: TrackerSample) => RigState;
  getState: () => RigState;
  getBaseline: () => HeadAngles | null;
}

export function createLiveTrackerDriver(sink: RigTargetSink, initialState: RigState = NEUTRAL_CENTER): LiveTrackerDriver {
  let current = initialState;
  let baseline: HeadAngles | null = null;

  const forward = (state: RigState) => {
    const report = (err: unknown) =>
      console.error(`[LiveTracker] Target ${stateKey(state)} failed:`, errorMessage(err));
    try {
      void Promise.resolve(sink.requestTarget(state)).catch(report);
    } catch (err) {
      report(err);
    }
  };

  return {
    calibrate(sample) {
      baseline = sample ? { pitch: sample.pitch, yaw: sample.yaw, roll: sample.roll } : null;
      if (sample) console.log('[LiveTracker] Calibrated:', baseline);
    },

    push(sample) {
      if (!baseline) {
        baseline = { pitch: sample.pitch, yaw: sample.yaw, roll: sample.roll };
        console.log('[LiveTracker] Auto-calibrated:', baseline);
      }
      const next = discretizeTrackerSample(sample, current, baseline);
      if (!sameState(next, current)) {
        current = next;
        forward(next);
      }
      return current;
    },

    getState: () => current,
    getBaseline: () => baseline,
  };
}
