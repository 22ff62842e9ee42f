import * as aws from "@pulumi/aws";
import type * as pulumi from "@pulumi/pulumi";
import { METRIC_FILTER_PATTERN } from "@script-alarm/script-runner/sentinel";

export const FAILURE_METRIC_NAME = "ScriptFailures";

export type MissingDataPolicy = "notBreaching" | "breaching" | "ignore" | "missing";

export interface FailureAlarmOptions {
  /** Log group the handler writes to */
  logGroupName: pulumi.Input<string>;
  /** Address subscribed to alarm and recovery emails (must confirm the subscription) */
  notificationEmail: string;
  /** Evaluation period in seconds (default: 60) */
  periodSeconds?: number;
  /** Failure count per period that raises the alarm (default: 1) */
  threshold?: number;
  /** Metric namespace (default: the component name) */
  metricNamespace?: string;
  /** Default: ignore, so a period without logs neither raises nor clears the alarm */
  treatMissingData?: MissingDataPolicy;
  tags?: Record<string, string>;
}

export interface FailureAlarmOutputs {
  topic: aws.sns.Topic;
  subscription: aws.sns.TopicSubscription;
  metricFilter: aws.cloudwatch.LogMetricFilter;
  alarm: aws.cloudwatch.MetricAlarm;
}

export function createFailureAlarm(
  name: string,
  options: FailureAlarmOptions,
): FailureAlarmOutputs {
  const tags = options.tags ?? {};
  const namespace = options.metricNamespace ?? name;

  // 1. Notification channel
  const topic = new aws.sns.Topic(`${name}-alerts`, {
    name: `${name}-alerts`,
    tags,
  });

  const subscription = new aws.sns.TopicSubscription(`${name}-email`, {
    topic: topic.arn,
    protocol: "email",
    endpoint: options.notificationEmail,
  });

  // 2. One count per sentinel line; windows with logs but no match report 0
  const metricFilter = new aws.cloudwatch.LogMetricFilter(`${name}-failures`, {
    name: `${name}-script-failures`,
    logGroupName: options.logGroupName,
    pattern: METRIC_FILTER_PATTERN,
    metricTransformation: {
      name: FAILURE_METRIC_NAME,
      namespace,
      value: "1",
      defaultValue: "0",
    },
  });

  // 3. Alarm with actions on both transitions
  const alarm = new aws.cloudwatch.MetricAlarm(
    `${name}-alarm`,
    {
      name: `${name}-script-failures`,
      alarmDescription: `Script run by ${name} exited nonzero or could not start`,
      namespace,
      metricName: FAILURE_METRIC_NAME,
      statistic: "Sum",
      period: options.periodSeconds ?? 60,
      evaluationPeriods: 1,
      threshold: options.threshold ?? 1,
      comparisonOperator: "GreaterThanOrEqualToThreshold",
      treatMissingData: options.treatMissingData ?? "ignore",
      alarmActions: [topic.arn],
      okActions: [topic.arn],
      tags,
    },
    { dependsOn: [metricFilter] },
  );

  return { topic, subscription, metricFilter, alarm };
}
