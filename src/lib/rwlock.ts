// async reader-writer lock
// any number of readers at once, or exactly one writer. waiters are served in arrival
// order, so a queued writer holds back readers that arrive after it.

type Mode = 'read' | 'write';

interface Waiter {
  mode: Mode;
  grant: () => void;
}

export type Release = () => void;

export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  acquireRead(): Promise<Release> {
    return this.enqueue('read');
  }

  acquireWrite(): Promise<Release> {
    return this.enqueue('write');
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get activeReaders(): number {
    return this.readers;
  }

  get isWriteLocked(): boolean {
    return this.writing;
  }

  get pending(): number {
    return this.queue.length;
  }

  private enqueue(mode: Mode): Promise<Release> {
    return new Promise(resolve => {
      this.queue.push({
        mode,
        grant: () => resolve(this.releaser(mode))
      });
      this.drain();
    });
  }

  private releaser(mode: Mode): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (mode === 'write') {
        this.writing = false;
      } else {
        this.readers--;
      }
      this.drain();
    };
  }

  // hand the lock to as many queued waiters as are compatible, front first
  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (this.writing) return;

      if (next.mode === 'write') {
        if (this.readers > 0) return;
        this.queue.shift();
        this.writing = true;
        next.grant();
        return;
      }

      this.queue.shift();
      this.readers++;
      next.grant();
    }
  }
}
