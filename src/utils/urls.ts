export function hostnameOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}

/**
 * True when the URL's host is the domain itself or one of its subdomains
 */
export function matchesDomain(url: string, domain: string): boolean {
  const host = hostnameOf(url);
  if (!host) return false;
  const target = domain.toLowerCase();
  return host === target || host.endsWith(`.${target}`);
}
