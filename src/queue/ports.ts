/** Producer-side view of a queue: it may write, never read. */
export interface WritePort<T> {
  put(value: T): Promise<void>;
  isFull(): boolean;
  reset(): void;
}

/** Consumer-side view of a queue: it may read, never write. */
export interface ReadPort<T> {
  take(): Promise<T>;
  isEmpty(): boolean;
  size(): number;
}

/** The only thing the drain monitor may ask of the queue. */
export interface EmptinessProbe {
  isEmpty(): boolean;
}
