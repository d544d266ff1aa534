import { env } from './env.config';

function normalizeOrigin(origin: string): string {
  return origin.replace(/\/+$/, '');
}

/**
 * Allowed browser origins from FRONTEND_URL and the comma-separated FRONTEND_URLS.
 */
export function buildAllowlist(frontendUrl: string | undefined, frontendUrls: string | undefined): string[] {
  const origins: string[] = [];

  if (frontendUrl) {
    origins.push(normalizeOrigin(frontendUrl));
  }

  if (frontendUrls) {
    origins.push(
      ...frontendUrls
        .split(',')
        .map((s) => normalizeOrigin(s.trim()))
        .filter(Boolean)
    );
  }

  return origins;
}

const allowlist = buildAllowlist(env.FRONTEND_URL, env.FRONTEND_URLS);

export function isAllowedOrigin(origin: string): boolean {
  return allowlist.includes(normalizeOrigin(origin));
}

/**
 * Local dev servers and emulators.
 */
export function isAllowedDevOrigin(origin: string): boolean {
  return (
    origin.startsWith('http://localhost:') ||
    origin.startsWith('http://127.0.0.1:') ||
    origin.startsWith('https://localhost:') ||
    origin.startsWith('http://10.0.2.2:')
  );
}
