interface PendingRequest<R, T> {
  request: R;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

/**
 * Serializes reloads behind a single consumer.
 *
 * Requests made while a reload is running are merged into one follow-up
 * run; every caller settles with the outcome of the first run that started
 * after its request.
 */
export class ReloadQueue<R, T> {
  private pending: PendingRequest<R, T>[] = [];
  private draining: Promise<void> | null = null;

  /** `task` receives every request merged into the run */
  constructor(private readonly task: (requests: R[]) => Promise<T>) {}

  request(request: R): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.pending.push({ request, resolve, reject });
      if (!this.draining) {
        this.draining = this.drain();
      }
    });
  }

  /** Resolves once no run is active or queued */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  isBusy(): boolean {
    return this.draining !== null;
  }

  pendingCount(): number {
    return this.pending.length;
  }

  private async drain(): Promise<void> {
    try {
      while (this.pending.length > 0) {
        const batch = this.pending;
        this.pending = [];
        try {
          const result = await this.task(batch.map((entry) => entry.request));
          batch.forEach((entry) => entry.resolve(result));
        } catch (error) {
          batch.forEach((entry) => entry.reject(error));
        }
      }
    } finally {
      this.draining = null;
    }
  }
}
