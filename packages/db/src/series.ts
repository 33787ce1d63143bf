import type { CheckStatus, HistoryRecord } from './json';

export type TargetId = string;

export type Target = {
  id: TargetId;
  displayName: string;
};

// A normalized history record: `timestamp` always carries an explicit offset.
export type Observation = Readonly<HistoryRecord>;

export type History = Map<TargetId, Observation[]>;

export type BucketState =
  | { kind: 'observed'; status: CheckStatus }
  | { kind: 'missing'; resolved: CheckStatus | 'no_data' }
  | { kind: 'future' };

export type Bucket = {
  index: number;
  startAt: number;
  endAt: number;
  state: BucketState;
};

export type BucketedSeries = {
  target: TargetId;
  rangeStartAt: number;
  rangeEndAt: number;
  bucketWidthMs: number;
  buckets: Bucket[];
};

export type BucketValue = CheckStatus | 'no_data' | 'future';

export function bucketValue(state: BucketState): BucketValue {
  switch (state.kind) {
    case 'observed':
      return state.status;
    case 'missing':
      return state.resolved;
    case 'future':
      return 'future';
  }
}

const NON_ALNUM = /[^\p{L}\p{N}]/gu;

/**
 * Filesystem-safe name for a target address. History keys stay raw; renderer file
 * names (`chart_<name>.svg`) are derived with this function only.
 */
export function sanitizeTargetName(address: string): string {
  return address.replace(NON_ALNUM, '_');
}
