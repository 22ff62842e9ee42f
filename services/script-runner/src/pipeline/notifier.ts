import type { AlarmState } from "./alarm";

export type NotificationKind = "alarm" | "recovery";

export interface AlarmNotification {
  kind: NotificationKind;
  alarmName: string;
  previousState: AlarmState;
  state: AlarmState;
  periodStart: number;
  value: number;
  threshold: number;
}

export interface Notifier {
  notify(notification: AlarmNotification): Promise<void>;
}

export interface EmailMessage {
  subject: string;
  body: string;
}

export function formatNotification(n: AlarmNotification): EmailMessage {
  const period = new Date(n.periodStart).toISOString();
  const reason =
    n.kind === "alarm"
      ? `${n.value} failure record(s) in the period starting ${period} (threshold ${n.threshold}).`
      : `${n.value} failure record(s) in the period starting ${period}, below threshold ${n.threshold}.`;

  return {
    subject: `${n.state}: "${n.alarmName}"`,
    body: [
      `Alarm "${n.alarmName}" changed from ${n.previousState} to ${n.state}.`,
      `Reason: ${reason}`,
    ].join("\n"),
  };
}
