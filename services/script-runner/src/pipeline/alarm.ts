import type { MetricSample } from "./metric";
import type { AlarmNotification, Notifier } from "./notifier";

export type AlarmState = "OK" | "ALARM";

/**
 * Next state for one evaluation period. A missing sample is not breaching:
 * it never raises the alarm and never clears it.
 */
export function evaluateAlarm(
  state: AlarmState,
  sample: MetricSample | undefined,
  threshold: number,
): AlarmState {
  if (!sample) return state;
  return sample.value >= threshold ? "ALARM" : "OK";
}

export interface AlarmDispatcherOptions {
  name: string;
  threshold: number;
  notifier: Notifier;
  initialState?: AlarmState;
}

export interface AlarmDispatcher {
  readonly state: AlarmState;
  /** Evaluate one period; resolves to the notification sent, if any. */
  evaluate(periodStart: number, sample?: MetricSample): Promise<AlarmNotification | null>;
}

export function createAlarmDispatcher(options: AlarmDispatcherOptions): AlarmDispatcher {
  let state: AlarmState = options.initialState ?? "OK";

  return {
    get state() {
      return state;
    },

    async evaluate(periodStart, sample) {
      const previousState = state;
      state = evaluateAlarm(previousState, sample, options.threshold);
      if (state === previousState) return null;

      const notification: AlarmNotification = {
        kind: state === "ALARM" ? "alarm" : "recovery",
        alarmName: options.name,
        previousState,
        state,
        periodStart,
        value: sample?.value ?? 0,
        threshold: options.threshold,
      };
      await options.notifier.notify(notification);
      return notification;
    },
  };
}
