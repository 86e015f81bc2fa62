/**
 * Thin HTTP client for the storage-binder compile API.
 * Manifests are sent as FDL text or as an already-decoded object; the
 * service does all validation.
 */

export type IdStrategy = 'sequential' | 'hash' | 'random';

export interface CompileParams {
  manifest: string | Record<string, unknown>;
  id?: string;
  id_strategy?: IdStrategy;
}

export interface CompiledStorage {
  name: string;
  id: string;
  type: string;
}

export interface CompileResult {
  ok: true;
  bindings: Record<string, string>;
  storages: CompiledStorage[];
}

export interface CompilationEntry {
  id: number;
  timestamp: string;
  manifestId: string;
  status: 'success' | 'failure';
  storages: CompiledStorage[];
  bindingsCount: number;
  errors: Array<{ code: string; message: string; function?: string; storage?: string }>;
}

export interface BinderClientConfig {
  baseUrl: string;
}

export class BinderClient {
  private baseUrl: string;

  constructor(config: BinderClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  /**
   * Compile a manifest into environment bindings.
   * Rejected manifests surface as BinderApiError with the service's error body.
   */
  async compile(params: CompileParams): Promise<CompileResult> {
    const res = await fetch(`${this.baseUrl}/v1/compile`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(params),
    });

    if (!res.ok) {
      const text = await res.text();
      throw new BinderApiError('compile', res.status, text);
    }

    return res.json() as Promise<CompileResult>;
  }

  async compilations(filters: { status?: 'success' | 'failure'; limit?: number } = {}): Promise<CompilationEntry[]> {
    const query = new URLSearchParams();
    if (filters.status) query.set('status', filters.status);
    if (filters.limit) query.set('limit', String(filters.limit));
    const qs = query.toString();
    const suffix = qs ? `?${qs}` : '';

    const res = await fetch(`${this.baseUrl}/v1/compilations${suffix}`);
    if (!res.ok) {
      const text = await res.text();
      throw new BinderApiError('compilations', res.status, text);
    }

    const body = await res.json() as { entries: CompilationEntry[] };
    return body.entries;
  }
}

export class BinderApiError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly statusCode: number,
    public readonly body: string,
  ) {
    super(`storage-binder API error on ${endpoint}: ${statusCode} - ${body}`);
    this.name = 'BinderApiError';
  }

  /** Error codes reported by the service, if the body carries them. */
  get codes(): string[] {
    try {
      const parsed: unknown = JSON.parse(this.body);
      if (typeof parsed !== 'object' || parsed === null || !('error' in parsed)) return [];
      const error = parsed.error;
      if (typeof error !== 'object' || error === null) return [];
      if ('errors' in error && Array.isArray(error.errors)) {
        return error.errors.flatMap((e: unknown) =>
          typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string' ? [e.code] : [],
        );
      }
      return 'code' in error && typeof error.code === 'string' ? [error.code] : [];
    } catch {
      return [];
    }
  }
}
