import { EventEmitter } from "node:events";
import { formatStats, formatTime } from "../metrics/metrics";
import { PipelineEventMap, PipelineEventName } from "../types/PipelineEvents";

export interface ConsoleReporterOptions {
  write?: (line: string) => void;
  /** Also print bursts and queue stalls. */
  verbose?: boolean;
}

/**
 * Prints the run as it happens: the capacity at start, the monitor's drain
 * line, then the statistics block at shutdown.
 *
 * @returns a function that detaches the reporter
 */
export function attachConsoleReporter(pipeline: EventEmitter, options: ConsoleReporterOptions = {}): () => void {
  const write = options.write ?? ((line: string) => console.log(line));
  const detachers: Array<() => void> = [];

  function subscribe<K extends PipelineEventName>(event: K, listener: (payload: PipelineEventMap[K]) => void): void {
    pipeline.on(event, listener);
    detachers.push(() => pipeline.off(event, listener));
  }

  subscribe('pipeline:started', ({ capacity }) => {
    write(`queue capacity: ${capacity}`);
  });

  subscribe('monitor:drained', ({ time }) => {
    write(`Monitor: producer done and queue empty at ${formatTime(time)}`);
  });

  subscribe('pipeline:finished', ({ stats }) => {
    write('');
    for (const line of formatStats(stats)) {
      write(line);
    }
  });

  subscribe('task:error', ({ task, error, time }) => {
    write(`Task ${task} failed at ${formatTime(time)}: ${error.message}`);
  });

  if (options.verbose) {
    subscribe('producer:burst', ({ length, remaining, time }) => {
      write(`${formatTime(time)} producer wrote burst of ${length}, ${remaining} left`);
    });
    subscribe('queue:full', ({ size, time }) => {
      write(`${formatTime(time)} queue full at ${size}, producer blocked`);
    });
    subscribe('queue:empty', ({ time }) => {
      write(`${formatTime(time)} queue empty, consumer blocked`);
    });
  }

  return () => {
    for (const detach of detachers) {
      detach();
    }
  };
}
