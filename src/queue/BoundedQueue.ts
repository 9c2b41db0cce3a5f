import { EventEmitter } from "node:events";
import { Clock } from "../kernel/Simulation";
import { SimEvent } from "../kernel/SimEvent";
import { QueueCounters, QueueStats, computeStats } from "../metrics/metrics";
import { ReadPort, WritePort } from "./ports";

export interface BoundedQueueOptions {
    /** Time source stamped onto every take. Defaults to a clock stuck at 0. */
    clock?: Clock;
}

const ZERO_CLOCK: Clock = { now: 0 };

/** Boxed so that a stored `undefined` stays distinct from an empty slot. */
interface Slot<T> {
    value: T;
}

/**
 * Fixed-capacity ring buffer with blocking put/take.
 *
 * A put on a full queue suspends until a take frees a slot, and a take on an
 * empty queue suspends until a put supplies one. There is no timeout: a
 * blocked call waits for its counterpart indefinitely.
 *
 * Single producer, single consumer. Every mutation runs between suspension
 * points of a cooperative scheduler, which is what keeps it free of locks.
 */
export class BoundedQueue<T> extends EventEmitter implements WritePort<T>, ReadPort<T> {
    readonly capacity: number;

    private readonly storage: Array<Slot<T> | undefined>;
    private readonly clock: Clock;
    private head: number = 0;
    private tail: number = 0;
    private count: number = 0;

    private readonly notFull = new SimEvent();
    private readonly notEmpty = new SimEvent();

    private takesCompleted: number = 0;
    private occupancySum: number = 0;
    private maxOccupancySeen: number = 0;
    private elapsedAtLastTake: number = 0;
    private fullStalls: number = 0;
    private emptyStalls: number = 0;

    constructor(capacity: number, options: BoundedQueueOptions = {}) {
        super();
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new Error(`Capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
        this.storage = new Array<Slot<T> | undefined>(capacity).fill(undefined);
        this.clock = options.clock ?? ZERO_CLOCK;
    }

    async put(value: T): Promise<void> {
        while (this.count === this.capacity) {
            this.fullStalls++;
            this.emit('queue:full', { size: this.count, time: this.clock.now });
            await this.notFull.wait();
        }

        this.storage[this.tail] = { value };
        this.tail = (this.tail + 1) % this.capacity;
        this.count++;

        this.notEmpty.notify();
    }

    async take(): Promise<T> {
        while (this.count === 0) {
            this.emptyStalls++;
            this.emit('queue:empty', { time: this.clock.now });
            await this.notEmpty.wait();
        }

        // Occupancy is sampled before removal: it is what the consumer saw.
        this.occupancySum += this.count;
        if (this.count > this.maxOccupancySeen) {
            this.maxOccupancySeen = this.count;
        }
        this.takesCompleted++;
        this.elapsedAtLastTake = this.clock.now;

        const slot = this.storage[this.head];
        if (!slot) {
            throw new Error(`Queue slot ${this.head} is empty with ${this.count} items counted`);
        }
        this.storage[this.head] = undefined;
        this.head = (this.head + 1) % this.capacity;
        this.count--;

        this.notFull.notify();
        return slot.value;
    }

    size(): number {
        return this.count;
    }

    isEmpty(): boolean {
        return this.count === 0;
    }

    isFull(): boolean {
        return this.count === this.capacity;
    }

    /**
     * Drops every element and releases the references to them. Statistics
     * are kept.
     *
     * Precondition: no put or take is suspended on this queue. A suspended
     * caller would wake into a queue whose contents vanished, so the call
     * throws instead.
     */
    reset(): void {
        if (this.notFull.waiting > 0 || this.notEmpty.waiting > 0) {
            throw new Error("Cannot reset a queue while a put or take is suspended on it");
        }
        this.storage.fill(undefined);
        this.count = 0;
        this.head = 0;
        this.tail = 0;
    }

    getCounters(): QueueCounters {
        return {
            capacity: this.capacity,
            takesCompleted: this.takesCompleted,
            occupancySum: this.occupancySum,
            maxOccupancySeen: this.maxOccupancySeen,
            elapsedAtLastTake: this.elapsedAtLastTake,
            fullStalls: this.fullStalls,
            emptyStalls: this.emptyStalls,
        };
    }

    /** Summary for shutdown, once every task has stopped. */
    finalizeStats(): QueueStats {
        return computeStats(this.getCounters());
    }
}
