import * as aws from "@pulumi/aws";
import * as pulumi from "@pulumi/pulumi";

const LAMBDA_BASIC_EXECUTION_POLICY =
  "arn:aws:iam::aws:policy/service-role/AWSLambdaBasicExecutionRole";

export interface ScriptFunctionOptions {
  /**
   * Directory holding the built handler (`index.js`) and the script it wraps
   * @example "../../services/script-runner/dist"
   */
  codePath: string;
  /** Script path relative to the function's task root */
  scriptPath?: string;
  /** Reject the invocation on a nonzero exit so async retries engage */
  raiseOnFailure?: boolean;
  logRetentionDays: number;
  timeoutSeconds?: number;
  memorySize?: number;
  /** Async invoke retries before the event goes to the dead-letter queue (0-2) */
  maxRetryAttempts?: number;
  /** EventBridge schedule, e.g. "rate(1 hour)". No trigger is created when omitted. */
  scheduleExpression?: string;
  tags?: Record<string, string>;
}

export interface ScriptFunctionOutputs {
  role: aws.iam.Role;
  logGroup: aws.cloudwatch.LogGroup;
  fn: aws.lambda.Function;
  deadLetterQueue: aws.sqs.Queue;
  invokeConfig: aws.lambda.FunctionEventInvokeConfig;
  schedule?: aws.cloudwatch.EventRule;
}

export function createScriptFunction(
  name: string,
  options: ScriptFunctionOptions,
): ScriptFunctionOutputs {
  const functionName = `${name}-function`;
  const tags = options.tags ?? {};

  // 1. Execution role
  const role = new aws.iam.Role(`${name}-role`, {
    name: `${name}-role`,
    assumeRolePolicy: JSON.stringify({
      Version: "2012-10-17",
      Statement: [
        {
          Effect: "Allow",
          Principal: { Service: "lambda.amazonaws.com" },
          Action: "sts:AssumeRole",
        },
      ],
    }),
    tags,
  });

  new aws.iam.RolePolicyAttachment(`${name}-basic-execution`, {
    role: role.name,
    policyArn: LAMBDA_BASIC_EXECUTION_POLICY,
  });

  // 2. Log group owned by the stack so retention is set before the first write
  const logGroup = new aws.cloudwatch.LogGroup(`${name}-logs`, {
    name: `/aws/lambda/${functionName}`,
    retentionInDays: options.logRetentionDays,
    tags,
  });

  // 3. Dead-letter queue for events that exhausted their retries
  const deadLetterQueue = new aws.sqs.Queue(`${name}-dlq`, {
    name: `${name}-dlq`,
    messageRetentionSeconds: 14 * 24 * 60 * 60,
    tags,
  });

  new aws.iam.RolePolicy(`${name}-dlq-send`, {
    role: role.id,
    policy: pulumi.jsonStringify({
      Version: "2012-10-17",
      Statement: [
        {
          Effect: "Allow",
          Action: "sqs:SendMessage",
          Resource: deadLetterQueue.arn,
        },
      ],
    }),
  });

  // 4. Function. Text log format keeps each record on its own line.
  const fn = new aws.lambda.Function(
    functionName,
    {
      name: functionName,
      role: role.arn,
      runtime: "nodejs20.x",
      handler: "index.handler",
      code: new pulumi.asset.FileArchive(options.codePath),
      timeout: options.timeoutSeconds ?? 300,
      memorySize: options.memorySize ?? 256,
      environment: {
        variables: {
          SCRIPT_PATH: options.scriptPath ?? "./script.sh",
          RAISE_ON_FAILURE: String(options.raiseOnFailure ?? true),
        },
      },
      loggingConfig: {
        logFormat: "Text",
        logGroup: logGroup.name,
      },
      tags,
    },
    { dependsOn: [logGroup] },
  );

  // 5. Retry policy for asynchronous invocations
  const invokeConfig = new aws.lambda.FunctionEventInvokeConfig(`${name}-invoke-config`, {
    functionName: fn.name,
    maximumRetryAttempts: options.maxRetryAttempts ?? 2,
    maximumEventAgeInSeconds: 6 * 60 * 60,
    destinationConfig: {
      onFailure: { destination: deadLetterQueue.arn },
    },
  });

  if (!options.scheduleExpression) {
    return { role, logGroup, fn, deadLetterQueue, invokeConfig };
  }

  // 6. Optional schedule trigger (EventBridge invokes asynchronously)
  const schedule = new aws.cloudwatch.EventRule(`${name}-schedule`, {
    name: `${name}-schedule`,
    scheduleExpression: options.scheduleExpression,
    tags,
  });

  new aws.cloudwatch.EventTarget(`${name}-schedule-target`, {
    rule: schedule.name,
    arn: fn.arn,
  });

  new aws.lambda.Permission(`${name}-schedule-invoke`, {
    action: "lambda:InvokeFunction",
    function: fn.name,
    principal: "events.amazonaws.com",
    sourceArn: schedule.arn,
  });

  return { role, logGroup, fn, deadLetterQueue, invokeConfig, schedule };
}
