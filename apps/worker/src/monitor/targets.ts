export { sanitizeTargetName } from '@beacon/db';

export type ClassifiedTarget =
  | { kind: 'http'; url: string }
  | { kind: 'tcp'; host: string; port: number }
  | { kind: 'icmp'; host: string }
  | { kind: 'invalid'; error: string };

const TCP_PREFIX = 'tcp://';
const ICMP_PREFIX = 'icmp://';
const URL_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

function isValidPort(n: number): boolean {
  return Number.isInteger(n) && n >= 1 && n <= 65535;
}

// Hostnames and IP literals only; anything starting with '-' would reach ping as a flag.
const HOST_PATTERN = /^(?:[a-z0-9](?:[a-z0-9-]*[a-z0-9])?\.?)+$|^[0-9a-f:.]+$/i;

export function isValidHost(host: string): boolean {
  return host.length > 0 && host.length <= 253 && !host.startsWith('-') && HOST_PATTERN.test(host);
}

export function validateHttpTarget(target: string): string | null {
  let url: URL;
  try {
    url = new URL(target);
  } catch {
    return 'target must be a valid URL';
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return 'target protocol must be http or https';
  }

  if (!url.hostname) return 'target must include a hostname';

  const port = url.port ? Number(url.port) : url.protocol === 'http:' ? 80 : 443;
  if (!isValidPort(port)) return 'target port is invalid';

  return null;
}

export function parseTcpTarget(target: string): { host: string; port: number } | null {
  const trimmed = target.trim();
  if (trimmed.length === 0) return null;

  // IPv6 form: [::1]:443
  if (trimmed.startsWith('[')) {
    const end = trimmed.indexOf(']');
    if (end === -1) return null;
    const host = trimmed.slice(1, end);
    const rest = trimmed.slice(end + 1);
    if (!rest.startsWith(':')) return null;
    const port = Number(rest.slice(1));
    if (!isValidPort(port)) return null;
    return { host, port };
  }

  const idx = trimmed.lastIndexOf(':');
  if (idx <= 0) return null;
  const host = trimmed.slice(0, idx);
  if (host.includes(':')) return null; // IPv6 must use [addr]:port
  const port = Number(trimmed.slice(idx + 1));
  if (!isValidPort(port)) return null;
  return { host, port };
}

/**
 * Decides how a configured address is probed:
 * - `http://…` / `https://…` → HTTP GET
 * - `tcp://host:port` → TCP connect
 * - `icmp://host` → system ping
 * - other schemes are invalid; a bare host is checked over `https://`.
 */
export function classifyTarget(address: string): ClassifiedTarget {
  const trimmed = address.trim();
  if (trimmed.length === 0) return { kind: 'invalid', error: 'target is empty' };

  const lower = trimmed.toLowerCase();

  if (lower.startsWith(TCP_PREFIX)) {
    const parsed = parseTcpTarget(trimmed.slice(TCP_PREFIX.length));
    if (!parsed || parsed.host.length === 0) {
      return { kind: 'invalid', error: 'target must be in host:port format (IPv6: [addr]:port)' };
    }
    return { kind: 'tcp', host: parsed.host, port: parsed.port };
  }

  if (lower.startsWith(ICMP_PREFIX)) {
    const host = trimmed.slice(ICMP_PREFIX.length);
    if (!isValidHost(host)) return { kind: 'invalid', error: 'target host is invalid' };
    return { kind: 'icmp', host };
  }

  // Any other scheme is rejected by validateHttpTarget.
  const url = URL_SCHEME.test(trimmed) ? trimmed : `https://${trimmed}`;
  const err = validateHttpTarget(url);
  if (err) return { kind: 'invalid', error: err };
  return { kind: 'http', url };
}
