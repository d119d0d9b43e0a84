/**
 * Sensitive Data Filter
 *
 * Redacts credentials from log metadata: GitHub tokens, bearer tokens,
 * authorization headers and values stored under secret-looking keys.
 */
export class SensitiveDataFilter {
  static readonly REDACTED = '[REDACTED]';

  private static readonly SENSITIVE_PATTERNS: readonly RegExp[] = [
    // GitHub tokens (classic, fine-grained, OAuth, app and refresh)
    /ghp_[a-zA-Z0-9]{36,}/g,
    /github_pat_[a-zA-Z0-9_]{22,}/g,
    /gho_[a-zA-Z0-9]{36,}/g,
    /ghu_[a-zA-Z0-9]{36,}/g,
    /ghs_[a-zA-Z0-9]{36,}/g,
    /ghr_[a-zA-Z0-9]{36,}/g,

    /Bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi,
    /token\s+[a-zA-Z0-9_]{20,}/gi,
    /-----BEGIN\s+(?:RSA|EC|OPENSSH|DSA)?\s*PRIVATE\s+KEY-----[\s\S]*?-----END\s+(?:RSA|EC|OPENSSH|DSA)?\s*PRIVATE\s+KEY-----/g,
  ];

  private static readonly SENSITIVE_HEADERS = new Set([
    'authorization',
    'proxy-authorization',
    'x-api-key',
    'x-auth-token',
    'cookie',
    'set-cookie',
  ]);

  private static readonly SENSITIVE_KEYS = [
    'password',
    'token',
    'secret_value',
    'secretvalue',
    'encrypted_value',
    'apikey',
    'api_key',
    'privatekey',
    'private_key',
    'clientsecret',
    'client_secret',
    'authorization',
  ];

  /**
   * Filter sensitive data from any value
   */
  static filter(data: unknown): unknown {
    if (typeof data === 'string') {
      return this.filterString(data);
    }
    if (Array.isArray(data)) {
      return data.map((item) => this.filter(item));
    }
    if (data instanceof Error) {
      return {
        name: data.name,
        message: this.filterString(data.message),
        stack: data.stack === undefined ? undefined : this.filterString(data.stack),
      };
    }
    if (typeof data === 'object' && data !== null) {
      return this.filterObject(data);
    }
    return data;
  }

  static filterString(value: string): string {
    return this.SENSITIVE_PATTERNS.reduce(
      (filtered, pattern) => filtered.replace(pattern, this.REDACTED),
      value,
    );
  }

  static filterObject(obj: object): Record<string, unknown> {
    const filtered: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      filtered[key] = this.isSensitiveKey(key) ? this.REDACTED : this.filter(value);
    }
    return filtered;
  }

  static containsSensitiveData(value: string): boolean {
    return this.filterString(value) !== value;
  }

  private static isSensitiveKey(key: string): boolean {
    const lowerKey = key.toLowerCase();
    return (
      this.SENSITIVE_HEADERS.has(lowerKey) ||
      this.SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey))
    );
  }
}
