type Waiter = {
	mode: "read" | "write";
	grant: () => void;
};

/**
 * Async reader/writer lock around a value.
 *
 * Readers share the lock; a writer holds it alone. Waiters are granted in
 * arrival order, so a queued writer is not starved by a stream of readers
 * that arrive after it.
 */
export class RwLock<T> {
	private readers = 0;
	private writing = false;
	private queue: Waiter[] = [];

	constructor(private readonly value: T) {}

	async read<R>(fn: (value: T) => R | Promise<R>): Promise<R> {
		await this.acquire("read");
		try {
			return await fn(this.value);
		} finally {
			this.readers--;
			this.dispatch();
		}
	}

	async write<R>(fn: (value: T) => R | Promise<R>): Promise<R> {
		await this.acquire("write");
		try {
			return await fn(this.value);
		} finally {
			this.writing = false;
			this.dispatch();
		}
	}

	get pending(): number {
		return this.queue.length;
	}

	private acquire(mode: Waiter["mode"]): Promise<void> {
		return new Promise((resolve) => {
			this.queue.push({ mode, grant: resolve });
			this.dispatch();
		});
	}

	private dispatch(): void {
		while (this.queue.length > 0 && !this.writing) {
			const next = this.queue[0];
			if (next.mode === "write") {
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
