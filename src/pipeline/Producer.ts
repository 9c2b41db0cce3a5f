import { EventEmitter } from "node:events";
import { CompletionFlag, CompletionView } from "../kernel/CompletionFlag";
import { Scheduler } from "../kernel/Simulation";
import { WritePort } from "../queue/ports";
import Random from "../random/Random";

export interface ProducerOptions {
    totalQuota: number;
    burstRangeMax: number;
    pacingDelay: number;
    random: Random;
}

export type ProducerState = 'RUNNING' | 'DONE';

/**
 * Writes `totalQuota` values in bursts of 1..burstRangeMax, pausing
 * `pacingDelay` between bursts. Values count up from 1 inside each burst.
 * The last burst is cut short so exactly `totalQuota` values are written.
 */
export class Producer extends EventEmitter {
    private readonly scheduler: Scheduler;
    private readonly out: WritePort<number>;
    private readonly options: ProducerOptions;
    private readonly flag = new CompletionFlag();

    private state: ProducerState = 'RUNNING';
    private remainingQuota: number;
    private finishedAt?: number;

    constructor(scheduler: Scheduler, out: WritePort<number>, options: ProducerOptions) {
        super();
        if (!Number.isInteger(options.burstRangeMax) || options.burstRangeMax < 1) {
            throw new Error(`burstRangeMax must be a positive integer, got ${options.burstRangeMax}`);
        }
        this.scheduler = scheduler;
        this.out = out;
        this.options = options;
        this.remainingQuota = options.totalQuota;
    }

    /** Read-only view of the completion flag. */
    get done(): CompletionView {
        return this.flag;
    }

    async run(): Promise<void> {
        while (true) {
            const drawn = this.options.random.int(1, this.options.burstRangeMax);
            const length = Math.min(drawn, this.remainingQuota);
            let nextValue = 0;

            for (let i = 0; i < length; i++) {
                await this.out.put(++nextValue);
                this.remainingQuota--;
            }

            this.emit('producer:burst', {
                length,
                remaining: this.remainingQuota,
                time: this.scheduler.now,
            });

            if (this.remainingQuota <= 0) {
                this.finish();
                return;
            }

            await this.scheduler.delay(this.options.pacingDelay);
        }
    }

    getState(): ProducerState {
        return this.state;
    }

    getRemainingQuota(): number {
        return this.remainingQuota;
    }

    getFinishedAt(): number | undefined {
        return this.finishedAt;
    }

    private finish(): void {
        this.state = 'DONE';
        this.finishedAt = this.scheduler.now;
        this.flag.set();
        this.emit('producer:done', {
            produced: this.options.totalQuota - this.remainingQuota,
            time: this.finishedAt,
        });
    }
}
