// Pure HTTP utility functions

/**
 * Build URL from base URL and endpoint
 */
export const buildUrl = (baseUrl: string, endpoint: string): string => {
  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

  if (!endpoint || endpoint === '/') {
    return cleanBaseUrl;
  }

  const cleanEndpoint = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  return `${cleanBaseUrl}${cleanEndpoint}`;
};

/**
 * Sanitize URL for logging (redact credentials and sensitive query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);

    const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'secret', 'password'];
    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    if (urlObj.password) {
      urlObj.password = '***';
    }

    return urlObj.toString();
  } catch {
    return url;
  }
};

/**
 * Whether a thrown fetch error is the abort raised by our timeout controller
 */
export const isAbortError = (error: unknown): boolean => error instanceof Error && error.name === 'AbortError';
