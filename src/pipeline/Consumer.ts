import { EventEmitter } from "node:events";
import { Scheduler } from "../kernel/Simulation";
import { ReadPort } from "../queue/ports";

export interface ConsumerOptions {
    serviceDelay: number;
    onItem?: (value: number, time: number) => void;
}

/**
 * Takes one value, then spends `serviceDelay` on it, forever. It never stops
 * on its own; the simulation ends around it.
 */
export class Consumer extends EventEmitter {
    private readonly scheduler: Scheduler;
    private readonly input: ReadPort<number>;
    private readonly serviceDelay: number;
    private readonly onItem: (value: number, time: number) => void;

    constructor(scheduler: Scheduler, input: ReadPort<number>, options: ConsumerOptions) {
        super();
        this.scheduler = scheduler;
        this.input = input;
        this.serviceDelay = options.serviceDelay;
        this.onItem = options.onItem || (() => {});
    }

    async run(): Promise<void> {
        while (true) {
            const value = await this.input.take();
            const time = this.scheduler.now;

            this.onItem(value, time);
            this.emit('consumer:item', { value, time });

            await this.scheduler.delay(this.serviceDelay);
        }
    }
}
