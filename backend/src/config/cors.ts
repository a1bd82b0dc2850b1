import { config, isDevelopment } from './app.js';

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);

export function normalizeOrigin(origin: string): string {
  const trimmed = origin.trim();
  if (!trimmed) {
    return '';
  }
  try {
    const url = new URL(trimmed);
    return `${url.protocol.toLowerCase()}//${url.hostname.toLowerCase()}${url.port ? `:${url.port}` : ''}`;
  } catch {
    return trimmed.toLowerCase();
  }
}

function isLoopbackOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    return LOOPBACK_HOSTS.has(url.hostname.toLowerCase()) && /^https?:$/.test(url.protocol);
  } catch {
    return false;
  }
}

/** `http://localhost:5173` also admits the same port on 127.0.0.1 and [::1]. */
function withLoopbackAliases(origin: string): string[] {
  try {
    const url = new URL(origin);
    if (url.hostname !== 'localhost') {
      return [origin];
    }
    const port = url.port ? `:${url.port}` : '';
    return [origin, `${url.protocol}//127.0.0.1${port}`, `${url.protocol}//[::1]${port}`];
  } catch {
    return [origin];
  }
}

export interface OriginPolicy {
  readonly allowedOrigins: readonly string[];
  isAllowed(origin?: string | null): boolean;
  /** The origin to echo in Access-Control-Allow-Origin, if allowed. */
  resolve(origin?: string | null): string | undefined;
}

export function createOriginPolicy(configured: string, allowAnyLoopback: boolean): OriginPolicy {
  const allowed = new Set(
    configured
      .split(',')
      .map((origin) => origin.trim())
      .filter(Boolean)
      .flatMap(withLoopbackAliases)
      .map(normalizeOrigin)
      .filter(Boolean)
  );

  const isAllowed = (origin?: string | null) => {
    if (!origin) {
      return true;
    }
    return allowed.has(normalizeOrigin(origin)) || (allowAnyLoopback && isLoopbackOrigin(origin));
  };

  return {
    allowedOrigins: [...allowed],
    isAllowed,
    resolve: (origin) => (origin && isAllowed(origin) ? origin : undefined)
  };
}

export const originPolicy = createOriginPolicy(config.CORS_ORIGIN, isDevelopment);
