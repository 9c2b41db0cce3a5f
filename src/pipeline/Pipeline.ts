import { EventEmitter } from "node:events";
import { PipelineConfig, PipelineConfigInput, resolveConfig } from "../config";
import { Simulation } from "../kernel/Simulation";
import { QueueStats } from "../metrics/metrics";
import { BoundedQueue } from "../queue/BoundedQueue";
import Random from "../random/Random";
import { PipelineEventName } from "../types/PipelineEvents";
import { Consumer } from "./Consumer";
import { Monitor } from "./Monitor";
import { Producer } from "./Producer";

export interface PipelineOptions {
    onItem?: (value: number, time: number) => void;
}

export interface PipelineResult {
    capacity: number;
    /** Time the monitor confirmed drain, if it got that far. */
    drainedAt?: number;
    /** Time the producer set its completion flag. */
    finishedAt?: number;
    /** Clock value when the simulation ended. */
    endTime: number;
    stats: QueueStats;
}

/**
 * Producer → BoundedQueue → Consumer, watched by a Monitor, all on one
 * simulation. Every component event is re-emitted here.
 */
export class Pipeline extends EventEmitter {
    readonly config: PipelineConfig;
    readonly simulation: Simulation;
    readonly queue: BoundedQueue<number>;
    readonly producer: Producer;
    readonly consumer: Consumer;
    readonly monitor: Monitor;

    private hasRun: boolean = false;

    constructor(config: PipelineConfigInput = {}, options: PipelineOptions = {}) {
        super();
        this.config = resolveConfig(config);

        this.simulation = new Simulation();
        this.queue = new BoundedQueue<number>(this.config.capacity, { clock: this.simulation });

        this.producer = new Producer(this.simulation, this.queue, {
            totalQuota: this.config.totalQuota,
            burstRangeMax: this.config.burstRangeMax,
            pacingDelay: this.config.pacingDelay,
            random: new Random(this.config.seed),
        });
        this.consumer = new Consumer(this.simulation, this.queue, {
            serviceDelay: this.config.serviceDelay,
            onItem: options.onItem,
        });
        this.monitor = new Monitor(this.simulation, this.producer.done, this.queue, {
            pollInterval: this.config.pollInterval,
            stopOnDrain: this.config.stopOnDrain,
        });

        this.forward(this.queue, ['queue:full', 'queue:empty']);
        this.forward(this.producer, ['producer:burst', 'producer:done']);
        this.forward(this.consumer, ['consumer:item']);
        this.forward(this.monitor, ['monitor:drained']);
        this.forward(this.simulation, ['task:error']);
    }

    async run(): Promise<PipelineResult> {
        if (this.hasRun) {
            throw new Error("Pipeline has already been run");
        }
        this.hasRun = true;

        this.emit('pipeline:started', { capacity: this.config.capacity });

        this.simulation.spawn('producer', () => this.producer.run());
        this.simulation.spawn('consumer', () => this.consumer.run());
        this.simulation.spawn('monitor', () => this.monitor.run());

        const endTime = await this.simulation.run();

        // All tasks are suspended or finished from here on.
        const stats = this.queue.finalizeStats();
        this.emit('pipeline:finished', { endTime, stats });

        return {
            capacity: this.config.capacity,
            drainedAt: this.monitor.getDrainedAt(),
            finishedAt: this.producer.getFinishedAt(),
            endTime,
            stats,
        };
    }

    private forward(source: EventEmitter, events: PipelineEventName[]): void {
        for (const event of events) {
            source.on(event, (payload: unknown) => this.emit(event, payload));
        }
    }
}
