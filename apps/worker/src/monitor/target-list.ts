import type { Target } from '@beacon/db';
import fse from 'fs-extra';

import { AppError, toErrorMessage } from '../errors';
import type { Logger } from '../logger';

export const DEFAULT_TARGETS: readonly Target[] = [
  { id: 'google.com', displayName: 'Google' },
  { id: 'github.com', displayName: 'GitHub' },
];

export type TargetSource = 'env' | 'file' | 'defaults';

function parseEntry(entry: string): Target | null {
  const line = entry.trim();
  if (!line) return null;

  const eq = line.indexOf('=');
  if (eq === -1) return { id: line, displayName: line };

  const displayName = line.slice(0, eq).trim();
  const id = line.slice(eq + 1).trim();
  if (!id) return null;
  return { id, displayName: displayName || id };
}

/** One target per line, `DisplayName=address` or a bare address. Blank lines are ignored. */
export function parseTargetList(text: string): Target[] {
  const targets: Target[] = [];
  for (const line of text.split(/\r?\n/)) {
    const t = parseEntry(line);
    if (t) targets.push(t);
  }
  return targets;
}

/** Comma-separated variant of the list format, for environment variables. */
export function parseTargetEnv(value: string): Target[] {
  const targets: Target[] = [];
  for (const entry of value.split(',')) {
    const t = parseEntry(entry);
    if (t) targets.push(t);
  }
  return targets;
}

export type ResolveTargetsOptions = {
  targetsFile: string;
  targetsEnv: string | null;
  requireTargets: boolean;
  logger: Logger;
};

/**
 * Resolves the live target list: environment list first, then the targets file, then
 * the built-in defaults. With `requireTargets` set, falling through to the defaults is
 * a misconfiguration instead.
 */
export async function resolveTargets(
  opts: ResolveTargetsOptions,
): Promise<{ targets: Target[]; source: TargetSource }> {
  const { logger } = opts;

  if (opts.targetsEnv !== null) {
    const fromEnv = parseTargetEnv(opts.targetsEnv);
    if (fromEnv.length > 0) {
      logger.info('loaded targets', { source: 'env', count: fromEnv.length });
      return { targets: fromEnv, source: 'env' };
    }
    logger.warn('UPTIME_TARGETS is set but lists no targets', { code: 'CONFIGURATION_MISSING' });
  }

  let reason: string;
  try {
    if (await fse.pathExists(opts.targetsFile)) {
      const fromFile = parseTargetList(await fse.readFile(opts.targetsFile, 'utf-8'));
      if (fromFile.length > 0) {
        logger.info('loaded targets', {
          source: 'file',
          file: opts.targetsFile,
          count: fromFile.length,
        });
        return { targets: fromFile, source: 'file' };
      }
      reason = 'targets file is empty';
    } else {
      reason = 'targets file not found';
    }
  } catch (err) {
    reason = `targets file is unreadable: ${toErrorMessage(err)}`;
  }

  if (opts.requireTargets) {
    throw new AppError(
      'MISCONFIGURED',
      `No targets configured (${reason}: ${opts.targetsFile}) and UPTIME_REQUIRE_TARGETS is set`,
    );
  }

  logger.warn(`${reason}, using default targets`, {
    code: 'CONFIGURATION_MISSING',
    file: opts.targetsFile,
    count: DEFAULT_TARGETS.length,
  });
  return { targets: DEFAULT_TARGETS.map((t) => ({ ...t })), source: 'defaults' };
}
