// Kernel
export { Simulation } from "./kernel/Simulation";
export type { Clock, Scheduler, RunOptions } from "./kernel/Simulation";
export { SimEvent } from "./kernel/SimEvent";
export { CompletionFlag } from "./kernel/CompletionFlag";
export type { CompletionView } from "./kernel/CompletionFlag";
export { Random } from "./random/Random";

// Queue
export { BoundedQueue } from "./queue/BoundedQueue";
export type { BoundedQueueOptions } from "./queue/BoundedQueue";
export type { WritePort, ReadPort, EmptinessProbe } from "./queue/ports";

// Pipeline
export { Producer } from "./pipeline/Producer";
export type { ProducerOptions, ProducerState } from "./pipeline/Producer";
export { Consumer } from "./pipeline/Consumer";
export type { ConsumerOptions } from "./pipeline/Consumer";
export { Monitor } from "./pipeline/Monitor";
export type { MonitorOptions, MonitorState } from "./pipeline/Monitor";
export { Pipeline } from "./pipeline/Pipeline";
export type { PipelineOptions, PipelineResult } from "./pipeline/Pipeline";

// Config
export { PipelineConfigSchema, resolveConfig, clampCapacity, DEFAULT_CAPACITY, MIN_CAPACITY, MAX_CAPACITY } from "./config";
export type { PipelineConfig, PipelineConfigInput } from "./config";

// Metrics and reporting
export { computeStats, formatStats, formatNumber, formatTime } from "./metrics/metrics";
export type { QueueStats, QueueCounters } from "./metrics/metrics";
export { attachConsoleReporter } from "./reporter/ConsoleReporter";
export type { ConsoleReporterOptions } from "./reporter/ConsoleReporter";

// Types
export type { PipelineEventMap, PipelineEventName } from "./types/PipelineEvents";
