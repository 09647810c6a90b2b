/** Host equality used by the `sameHost` option; unparsable input never matches. */
export function sameHost(a: string | URL, b: string | URL): boolean {
  try {
    const aUrl = typeof a === 'string' ? new URL(a) : a;
    const bUrl = typeof b === 'string' ? new URL(b) : b;
    return aUrl.host.toLowerCase() === bUrl.host.toLowerCase();
  } catch {
    return false;
  }
}
