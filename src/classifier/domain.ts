import { getDomain } from 'tldts';

const HOST_LABEL = /^[a-z0-9_](?:[a-z0-9_-]{0,61}[a-z0-9_])?$/;
const IPV4 = /^\d{1,3}(?:\.\d{1,3}){3}$/;
const MAX_HOST_LENGTH = 253;

/**
 * Normalize a host, host:port, or URL to the classification key: the
 * registrable domain (`cdn.social.example` → `social.example`,
 * `www.example.co.uk` → `example.co.uk`) of the lowercase hostname, without
 * scheme, userinfo, path, port or trailing dot. IP literals are kept as they
 * are, IPv6 without brackets. Hosts with no registrable part, such as
 * `localhost`, stay whole. Returns null when nothing usable is left.
 */
export function normalizeDomain(input: string): string | null {
  let value = input.trim().toLowerCase();
  if (value.length === 0) return null;

  const scheme = value.indexOf('://');
  if (scheme >= 0) value = value.slice(scheme + 3);

  // Drop path, query and fragment
  value = value.split(/[/?#]/, 1)[0] ?? '';

  const at = value.lastIndexOf('@');
  if (at >= 0) value = value.slice(at + 1);

  if (value.startsWith('[')) {
    const close = value.indexOf(']');
    if (close < 0) return null;
    const ipv6 = value.slice(1, close);
    return /^[0-9a-f:.]+$/.test(ipv6) && ipv6.includes(':') ? ipv6 : null;
  }

  const colon = value.indexOf(':');
  if (colon >= 0) {
    // A second colon means an unbracketed IPv6 literal
    if (value.indexOf(':', colon + 1) >= 0) {
      return /^[0-9a-f:.]+$/.test(value) ? value : null;
    }
    const port = value.slice(colon + 1);
    if (port.length > 0 && !/^\d{1,5}$/.test(port)) return null;
    value = value.slice(0, colon);
  }

  value = value.replace(/\.+$/, '');
  if (value.length === 0 || value.length > MAX_HOST_LENGTH) return null;
  if (IPV4.test(value)) return value;

  if (!value.split('.').every(label => HOST_LABEL.test(label))) return null;

  return getDomain(value, { extractHostname: false, validateHostname: false, detectIp: false }) ?? value;
}
