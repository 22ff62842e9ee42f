import * as pulumi from "@pulumi/pulumi";
import { readMonitorConfig } from "./config";
import { createFailureAlarm } from "./components/failure-alarm";
import { createScriptFunction } from "./components/script-function";

// Load configuration
const config = readMonitorConfig(new pulumi.Config());

const tags = {
  project: config.namePrefix,
  stack: pulumi.getStack(),
  "managed-by": "pulumi",
};

// =============================================================================
// Script runner - Lambda wrapping the shell script
// =============================================================================

const scriptFunction = createScriptFunction(config.namePrefix, {
  codePath: config.codePath,
  scriptPath: config.scriptPath,
  raiseOnFailure: config.raiseOnFailure,
  logRetentionDays: config.logRetentionDays,
  timeoutSeconds: config.timeoutSeconds,
  memorySize: config.memorySize,
  maxRetryAttempts: config.maxRetryAttempts,
  scheduleExpression: config.scheduleExpression,
  tags,
});

// =============================================================================
// Failure alarm - metric filter on the sentinel, alarm, email topic
// =============================================================================

const failureAlarm = createFailureAlarm(config.namePrefix, {
  logGroupName: scriptFunction.logGroup.name,
  notificationEmail: config.notificationEmail,
  periodSeconds: config.alarmPeriodSeconds,
  threshold: config.alarmThreshold,
  tags,
});

// =============================================================================
// Exports
// =============================================================================

export const functionName = scriptFunction.fn.name;
export const functionArn = scriptFunction.fn.arn;
export const logGroupName = scriptFunction.logGroup.name;
export const deadLetterQueueUrl = scriptFunction.deadLetterQueue.url;
export const alarmName = failureAlarm.alarm.name;
export const topicArn = failureAlarm.topic.arn;

export const instructions = pulumi.interpolate`
================================================================================
SCRIPT ALARM DEPLOYED
================================================================================

Function:   ${scriptFunction.fn.name}
Log group:  ${scriptFunction.logGroup.name}
Alarm:      ${failureAlarm.alarm.name}

Confirm the SNS subscription email sent to ${config.notificationEmail}
before alarms are delivered.

Invoke asynchronously so failed runs are retried and dead-lettered:
  aws lambda invoke --function-name ${scriptFunction.fn.name} \\
    --invocation-type Event /dev/null
================================================================================
`;
