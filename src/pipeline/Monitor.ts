import { EventEmitter } from "node:events";
import { CompletionView } from "../kernel/CompletionFlag";
import { Scheduler } from "../kernel/Simulation";
import { EmptinessProbe } from "../queue/ports";

export interface MonitorOptions {
    pollInterval: number;
    /** Stop the whole simulation once drain is confirmed. */
    stopOnDrain?: boolean;
}

export type MonitorState = 'WAIT_PRODUCER' | 'WAIT_DRAIN' | 'DONE';

/**
 * Declares the run drained once the producer has finished and the queue is
 * empty at the same observation.
 *
 * Waiting for the producer is event driven. Waiting for the queue polls every
 * `pollInterval`, so a queue that refills and empties again between two polls
 * is not noticed; the reported time is the first poll that saw it empty.
 */
export class Monitor extends EventEmitter {
    private readonly scheduler: Scheduler;
    private readonly producerDone: CompletionView;
    private readonly queue: EmptinessProbe;
    private readonly pollInterval: number;
    private readonly stopOnDrain: boolean;

    private state: MonitorState = 'WAIT_PRODUCER';
    private drainedAt?: number;

    constructor(
        scheduler: Scheduler,
        producerDone: CompletionView,
        queue: EmptinessProbe,
        options: MonitorOptions,
    ) {
        super();
        this.scheduler = scheduler;
        this.producerDone = producerDone;
        this.queue = queue;
        this.pollInterval = options.pollInterval;
        this.stopOnDrain = options.stopOnDrain ?? false;
    }

    async run(): Promise<void> {
        while (!this.producerDone.isSet()) {
            await this.producerDone.changed();
        }

        this.state = 'WAIT_DRAIN';
        while (!this.queue.isEmpty()) {
            await this.scheduler.delay(this.pollInterval);
        }

        this.state = 'DONE';
        this.drainedAt = this.scheduler.now;
        this.emit('monitor:drained', { time: this.drainedAt });

        if (this.stopOnDrain) {
            this.scheduler.stop();
        }
    }

    getState(): MonitorState {
        return this.state;
    }

    getDrainedAt(): number | undefined {
        return this.drainedAt;
    }
}
