import path from "node:path";

/**
 * Serializes tasks per folder. Tasks for the same folder run one after another
 * in submission order; different folders do not wait on each other.
 */
export class FolderLock {
	private readonly tails = new Map<string, Promise<void>>();

	async run<T>(folder: string, task: () => Promise<T>): Promise<T> {
		const key = path.resolve(folder);
		const previous = this.tails.get(key) ?? Promise.resolve();

		const result = previous.then(task);
		// the queue only tracks completion; the caller receives the task's own outcome
		const tail = result.then(
			() => undefined,
			() => undefined,
		);
		this.tails.set(key, tail);

		try {
			return await result;
		} finally {
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		}
	}

	/** Number of folders with queued or running tasks */
	get activeFolders(): number {
		return this.tails.size;
	}
}
