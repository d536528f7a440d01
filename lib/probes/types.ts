/**
 * Type definitions for probes and probe families
 */

export const Grade = {
  Good: 'Good',
  Bad: 'Bad',
  Skipped: 'Skipped',
} as const;

export type Grade = (typeof Grade)[keyof typeof Grade];

/**
 * Addresses in resolver order
 */
export type AddressList = Array<string>;

/**
 * Address to "is inside a published range"
 */
export type RangeMembership = Record<string, boolean>;

export type ProbeOutput = AddressList | RangeMembership;

/**
 * Outcome of one probe run. `error` is set whenever the probe could not
 * produce a positive verdict for a reason other than the host itself.
 */
export interface ProbeResult<O extends ProbeOutput = ProbeOutput> {
  grade: Grade;
  output: O | null;
  error: Error | null;
}

export interface Probe<O extends ProbeOutput = ProbeOutput> {
  description: string;
  run(host: string): Promise<ProbeResult<O>>;
}

export interface ProbeFamily {
  description: string;
  probes: Readonly<Record<string, Probe>>;
}

export function passed<O extends ProbeOutput>(output: O | null = null): ProbeResult<O> {
  return { grade: Grade.Good, output, error: null };
}

export function failed<O extends ProbeOutput>(error: Error, grade: Grade = Grade.Bad): ProbeResult<O> {
  return { grade, output: null, error };
}
