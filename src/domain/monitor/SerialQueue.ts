/**
 * Runs async tasks one at a time, in submission order.
 * A failing task rejects its own promise without blocking later tasks.
 */
export class SerialQueue {
	private tail: Promise<void> = Promise.resolve();

	run<T>(task: () => T | Promise<T>): Promise<T> {
		const result = this.tail.then(task);
		this.tail = result.then(
			() => undefined,
			() => undefined,
		);
		return result;
	}

	/**
	 * Resolves once every task submitted so far has settled
	 */
	idle(): Promise<void> {
		return this.tail;
	}
}
