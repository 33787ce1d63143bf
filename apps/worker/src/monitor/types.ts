export type CheckOutcome = {
  status: 'up' | 'down';
  latencyMs: number | null;
  error: string | null;
  httpStatus: number | null;
  attempts: number;
};

export type ProbeKind = 'http' | 'tcp' | 'icmp';
