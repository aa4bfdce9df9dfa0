import type { ClientResult } from '../types/results.js';
import type { RemoteLabel } from '../types/remote.js';
import { fail, ok } from '../types/results.js';

export interface LabelSource {
  listLabels(): Promise<ClientResult<RemoteLabel[]>>;
  createLabel(name: string): Promise<ClientResult<RemoteLabel>>;
}

/**
 * Per-client label lookup. Loaded lazily on the first lookup and dropped
 * right after a creation, so labels added elsewhere show up on the next call.
 */
export class LabelCache {
  private labels: RemoteLabel[] | null = null;

  constructor(private readonly source: LabelSource) {}

  invalidate(): void {
    this.labels = null;
  }

  async ensure(rawName: string): Promise<ClientResult<RemoteLabel>> {
    const name = rawName.trimStart();
    if (!name) {
      return fail({ kind: 'invalid-argument', message: 'label name empty' });
    }

    const loaded = await this.load();
    if (loaded.type === 'error') return loaded;

    const wanted = name.toLowerCase();
    const existing = loaded.data.find((l) => l.name.toLowerCase() === wanted);
    if (existing) return ok(existing);

    const created = await this.source.createLabel(name);
    if (created.type === 'success') this.invalidate();
    return created;
  }

  private async load(): Promise<ClientResult<RemoteLabel[]>> {
    if (this.labels !== null) return ok(this.labels);
    const result = await this.source.listLabels();
    if (result.type === 'success') this.labels = result.data;
    return result;
  }
}
