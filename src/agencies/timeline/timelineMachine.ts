/**
 * Timeline State Machine
 *
 * Holds the three keyframe tracks and the transport status.
 * Tracks stay sorted by time; keyframes with equal times keep insertion order.
 * Editing is allowed in every transport state.
 */

import { setup, assign } from 'xstate';
import type { SnapshotFrom } from 'xstate';
import type {
  TimelineContext,
  TimelineEvent,
  TimelineTracks,
  TrackKeyframe,
  TrackName,
  TransportStatus,
} from './types';
import { EMPTY_TRACKS, TRACK_NAMES } from './types';

interface Keyed {
  id: string;
  timeMs: number;
}

type TrackEdit = <K extends Keyed>(track: readonly K[], keyframe: K) => K[];

/** Insert after every keyframe at or before its time. */
export const insertSorted: TrackEdit = (track, keyframe) => {
  let index = track.length;
  while (index > 0 && track[index - 1].timeMs > keyframe.timeMs) index--;
  return [...track.slice(0, index), keyframe, ...track.slice(index)];
};

/** Replace the keyframe with the same id and move it to its new time. */
export const replaceById: TrackEdit = (track, keyframe) => {
  if (!track.some(kf => kf.id === keyframe.id)) return [...track];
  return insertSorted(track.filter(kf => kf.id !== keyframe.id), keyframe);
};

export const sortTrack = <K extends Keyed>(track: readonly K[]): K[] =>
  [...track].sort((a, b) => a.timeMs - b.timeMs);

function editTrack(tracks: TimelineTracks, entry: TrackKeyframe, edit: TrackEdit): TimelineTracks {
  switch (entry.track) {
    case 'pose':
      return { ...tracks, pose: edit(tracks.pose, entry.keyframe) };
    case 'expression':
      return { ...tracks, expression: edit(tracks.expression, entry.keyframe) };
    case 'phoneme':
      return { ...tracks, phoneme: edit(tracks.phoneme, entry.keyframe) };
  }
}

function removeFromTrack(tracks: TimelineTracks, track: TrackName, id: string): TimelineTracks {
  switch (track) {
    case 'pose':
      return { ...tracks, pose: tracks.pose.filter(kf => kf.id !== id) };
    case 'expression':
      return { ...tracks, expression: tracks.expression.filter(kf => kf.id !== id) };
    case 'phoneme':
      return { ...tracks, phoneme: tracks.phoneme.filter(kf => kf.id !== id) };
  }
}

function clearTracks(tracks: TimelineTracks, names: readonly TrackName[]): TimelineTracks {
  return {
    pose: names.includes('pose') ? [] : tracks.pose,
    expression: names.includes('expression') ? [] : tracks.expression,
    phoneme: names.includes('phoneme') ? [] : tracks.phoneme,
  };
}

export const timelineMachine = setup({
  types: {
    context: {} as TimelineContext,
    events: {} as TimelineEvent,
  },
  actions: {
    addKeyframe: assign(({ context, event }) => {
      if (event.type !== 'ADD_KEYFRAME') return {};
      return { tracks: editTrack(context.tracks, event, insertSorted), revision: context.revision + 1 };
    }),

    updateKeyframe: assign(({ context, event }) => {
      if (event.type !== 'UPDATE_KEYFRAME') return {};
      return { tracks: editTrack(context.tracks, event, replaceById), revision: context.revision + 1 };
    }),

    deleteKeyframe: assign(({ context, event }) => {
      if (event.type !== 'DELETE_KEYFRAME') return {};
      return { tracks: removeFromTrack(context.tracks, event.track, event.id), revision: context.revision + 1 };
    }),

    replaceTrack: assign(({ context, event }) => {
      if (event.type !== 'REPLACE_TRACK') return {};
      const tracks: TimelineTracks =
        event.track === 'pose'
          ? { ...context.tracks, pose: sortTrack(event.keyframes) }
          : event.track === 'expression'
            ? { ...context.tracks, expression: sortTrack(event.keyframes) }
            : { ...context.tracks, phoneme: sortTrack(event.keyframes) };
      return { tracks, revision: context.revision + 1 };
    }),

    clearTracks: assign(({ context, event }) => {
      if (event.type !== 'CLEAR_TRACKS') return {};
      return { tracks: clearTracks(context.tracks, event.tracks ?? TRACK_NAMES), revision: context.revision + 1 };
    }),

    setDuration: assign(({ event }) => {
      if (event.type !== 'SET_DURATION') return {};
      const { durationMs } = event;
      return { durationMs: durationMs !== null && Number.isFinite(durationMs) && durationMs > 0 ? durationMs : null };
    }),
  },
}).createMachine({
  id: 'timeline',
  initial: 'stopped',
  context: {
    tracks: EMPTY_TRACKS,
    durationMs: null,
    revision: 0,
  },
  on: {
    ADD_KEYFRAME: { actions: 'addKeyframe' },
    UPDATE_KEYFRAME: { actions: 'updateKeyframe' },
    DELETE_KEYFRAME: { actions: 'deleteKeyframe' },
    REPLACE_TRACK: { actions: 'replaceTrack' },
    CLEAR_TRACKS: { actions: 'clearTracks' },
    SET_DURATION: { actions: 'setDuration' },
    STOP: { target: '.stopped' },
  },
  states: {
    stopped: {
      on: {
        PLAY: 'playing',
      },
    },
    playing: {
      on: {
        PAUSE: 'paused',
      },
    },
    paused: {
      on: {
        PLAY: 'playing',
      },
    },
  },
});

export type TimelineMachine = typeof timelineMachine;

export function transportStatusOf(snapshot: SnapshotFrom<TimelineMachine>): TransportStatus {
  if (snapshot.matches('playing')) return 'playing';
  if (snapshot.matches('paused')) return 'paused';
  return 'stopped';
}
