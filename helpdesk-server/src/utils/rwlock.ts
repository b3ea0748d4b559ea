type Release = () => void;

/**
 * Async read-write lock. Writers are preferred: once a writer is queued, new
 * readers wait behind it so appends are not starved by a stream of searches.
 */
export class RWLock {
  private readers = 0;
  private writer = false;
  private readQueue: Array<() => void> = [];
  private writeQueue: Array<() => void> = [];

  async readLock(): Promise<Release> {
    await new Promise<void>((resolve) => {
      const attempt = () => {
        if (!this.writer && this.writeQueue.length === 0) {
          this.readers += 1;
          resolve();
        } else {
          this.readQueue.push(attempt);
        }
      };
      attempt();
    });

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.readers -= 1;
      if (this.readers === 0) {
        this.writeQueue.shift()?.();
      }
    };
  }

  async writeLock(): Promise<Release> {
    await new Promise<void>((resolve) => {
      const attempt = () => {
        if (!this.writer && this.readers === 0) {
          this.writer = true;
          resolve();
        } else {
          this.writeQueue.push(attempt);
        }
      };
      attempt();
    });

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.writer = false;
      const nextWriter = this.writeQueue.shift();
      if (nextWriter) {
        nextWriter();
        return;
      }
      const waiting = this.readQueue.splice(0);
      for (const reader of waiting) {
        reader();
      }
    };
  }

  async withRead<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.readLock();
    try {
      return await task();
    } finally {
      release();
    }
  }

  async withWrite<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.writeLock();
    try {
      return await task();
    } finally {
      release();
    }
  }
}
