/**
 * Praat TextGrid reader: pulls the non-empty intervals of the "phones" tier.
 * Times in the file are seconds; returned intervals are milliseconds.
 */

import { MalformedTrackDataError } from '../rig/errors';
import type { PhonemeInterval } from './types';

const PHONES_TIER = /name = "phones"[\s\S]*?intervals: size = (\d+)([\s\S]*?)(?=item \[|$)/;
const INTERVAL = /intervals \[\d+\]:\s*xmin = ([\d.]+)\s*xmax = ([\d.]+)\s*text = "([^"]*)"/g;

export function parseTextGridPhones(content: string): PhonemeInterval[] {
  const tier = PHONES_TIER.exec(content);
  if (!tier) throw new MalformedTrackDataError('TextGrid', ['no "phones" tier']);

  const phones: PhonemeInterval[] = [];
  for (const match of tier[2].matchAll(INTERVAL)) {
    const label = match[3].trim();
    if (!label) continue;
    phones.push({
      startMs: parseFloat(match[1]) * 1000,
      endMs: parseFloat(match[2]) * 1000,
      label,
    });
  }
  return phones;
}
