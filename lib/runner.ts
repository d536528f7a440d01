/**
 * Runs selected probes against a host and collects serialisable reports
 */

import { ProbeError, errorMessage } from './errors';
import { componentLogger } from './logger';
import { Grade, type Probe, type ProbeFamily, type ProbeOutput } from './probes/types';

const runnerLogger = componentLogger('runner');

export interface ProbeReport {
  grade: Grade;
  output: ProbeOutput | null;
  error: string | null;
}

export type FamilyReport = Record<string, ProbeReport>;

export interface RunOptions {
  /** Regular expression matched against family names */
  family?: string;
  /** Regular expression matched against probe names */
  probe?: string;
}

export interface FamilyInfo {
  description: string;
  probes: Record<string, string>;
}

function compilePattern(kind: string, pattern: string | undefined): RegExp | null {
  if (pattern === undefined || pattern.length === 0) return null;
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ProbeError('INVALID_PATTERN', `invalid ${kind} pattern ${JSON.stringify(pattern)}: ${errorMessage(error)}`, { cause: error });
  }
}

async function runProbe(familyName: string, probeName: string, probe: Probe, host: string): Promise<ProbeReport> {
  const startedAt = Date.now();
  try {
    const result = await probe.run(host);
    runnerLogger.debug(
      { family: familyName, probe: probeName, host, grade: result.grade, ms: Date.now() - startedAt },
      'Probe finished'
    );
    return {
      grade: result.grade,
      output: result.output,
      error: result.error !== null ? result.error.message : null,
    };
  } catch (error) {
    runnerLogger.error({ err: error, family: familyName, probe: probeName, host }, 'Probe threw');
    return { grade: Grade.Bad, output: null, error: errorMessage(error) };
  }
}

/**
 * Run every selected probe of every selected family concurrently
 */
export async function runFamilies(
  families: Readonly<Record<string, ProbeFamily>>,
  host: string,
  options: RunOptions = {}
): Promise<Record<string, FamilyReport>> {
  const familyPattern = compilePattern('family', options.family);
  const probePattern = compilePattern('probe', options.probe);

  const selected = Object.entries(families).filter(([name]) => familyPattern?.test(name) ?? true);

  const reports = await Promise.all(
    selected.map(async ([familyName, family]) => {
      const probes = Object.entries(family.probes).filter(([name]) => probePattern?.test(name) ?? true);
      const results = await Promise.all(
        probes.map(async ([probeName, probe]) => [probeName, await runProbe(familyName, probeName, probe, host)] as const)
      );
      return [familyName, Object.fromEntries(results)] as const;
    })
  );

  return Object.fromEntries(reports);
}

/**
 * Family and probe descriptions, keyed by name
 */
export function describeFamilies(families: Readonly<Record<string, ProbeFamily>>): Record<string, FamilyInfo> {
  return Object.fromEntries(
    Object.entries(families).map(([name, family]) => [
      name,
      {
        description: family.description,
        probes: Object.fromEntries(
          Object.entries(family.probes).map(([probeName, probe]) => [probeName, probe.description])
        ),
      },
    ])
  );
}
