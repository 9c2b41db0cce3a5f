import { QueueStats } from "../metrics/metrics";

interface QueueStateEvents {
  'queue:full': { size: number; time: number };
  'queue:empty': { time: number };
}

interface ProducerEvents {
  'producer:burst': { length: number; remaining: number; time: number };
  'producer:done': { produced: number; time: number };
}

interface ConsumerEvents {
  'consumer:item': { value: number; time: number };
}

interface MonitorEvents {
  'monitor:drained': { time: number };
}

interface PipelineLifecycleEvents {
  'pipeline:started': { capacity: number };
  'pipeline:finished': { endTime: number; stats: QueueStats };
  'task:error': { task: string; error: Error; time: number };
}

export type PipelineEventMap = QueueStateEvents &
  ProducerEvents &
  ConsumerEvents &
  MonitorEvents &
  PipelineLifecycleEvents;

export type PipelineEventName = keyof PipelineEventMap;
