import { SENTINEL_PREFIX } from "../classification/sentinel";
import type { MemoryLogStream } from "../sink/memory";
import { createAlarmDispatcher, type AlarmState } from "./alarm";
import { extractMetric, periodStartOf, type MetricSample } from "./metric";
import type { AlarmNotification, Notifier } from "./notifier";

export interface SimulateOptions {
  alarmName: string;
  periodSeconds: number;
  threshold: number;
  notifier: Notifier;
  /** Epoch ms; evaluation starts at the period containing this instant */
  from: number;
  /** Epoch ms, exclusive */
  to: number;
  pattern?: string;
  initialState?: AlarmState;
}

export interface PeriodEvaluation {
  periodStart: number;
  sample: MetricSample | undefined;
  state: AlarmState;
  notification: AlarmNotification | null;
}

/**
 * Replay a log stream through the metric filter and alarm models, one
 * evaluation period at a time.
 */
export async function simulateAlarm(
  stream: MemoryLogStream,
  options: SimulateOptions,
): Promise<PeriodEvaluation[]> {
  const samples = new Map(
    extractMetric(stream.records(), {
      pattern: options.pattern ?? SENTINEL_PREFIX,
      periodSeconds: options.periodSeconds,
    }).map((s) => [s.periodStart, s]),
  );

  const dispatcher = createAlarmDispatcher({
    name: options.alarmName,
    threshold: options.threshold,
    notifier: options.notifier,
    initialState: options.initialState,
  });

  const periodMs = options.periodSeconds * 1000;
  const evaluations: PeriodEvaluation[] = [];

  for (
    let periodStart = periodStartOf(options.from, options.periodSeconds);
    periodStart < options.to;
    periodStart += periodMs
  ) {
    const sample = samples.get(periodStart);
    const notification = await dispatcher.evaluate(periodStart, sample);
    evaluations.push({ periodStart, sample, state: dispatcher.state, notification });
  }

  return evaluations;
}
