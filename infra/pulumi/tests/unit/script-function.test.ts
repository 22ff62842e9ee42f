import { describe, it, expect, beforeEach } from "vitest";
import { createScriptFunction } from "../../src/components/script-function";
import { findResource, listResources, resetResources } from "../__mocks__/@pulumi/aws";

const CODE_PATH = "../../services/script-runner/dist";

beforeEach(() => {
  resetResources();
});

describe("createScriptFunction — role", () => {
  it("should create a role Lambda can assume", () => {
    createScriptFunction("nightly", { codePath: CODE_PATH, logRetentionDays: 14 });

    const role = findResource("aws:iam/role:Role", "nightly-role");
    expect(JSON.parse(String(role.args.assumeRolePolicy))).toEqual({
      Version: "2012-10-17",
      Statement: [
        {
          Effect: "Allow",
          Principal: { Service: "lambda.amazonaws.com" },
          Action: "sts:AssumeRole",
        },
      ],
    });
  });

  it("should attach the basic execution policy", () => {
    createScriptFunction("nightly", { codePath: CODE_PATH, logRetentionDays: 14 });

    expect(
      findResource(
        "aws:iam/rolePolicyAttachment:RolePolicyAttachment",
        "nightly-basic-execution",
      ).args,
    ).toEqual({
      role: "nightly-role",
      policyArn: "arn:aws:iam::aws:policy/service-role/AWSLambdaBasicExecutionRole",
    });
  });

  it("should let the role send to the dead-letter queue", () => {
    createScriptFunction("nightly", { codePath: CODE_PATH, logRetentionDays: 14 });

    const policy = findResource("aws:iam/rolePolicy:RolePolicy", "nightly-dlq-send");
    expect(policy.args.role).toBe("nightly-role-id");
    expect(JSON.parse(String(policy.args.policy))).toEqual({
      Version: "2012-10-17",
      Statement: [
        {
          Effect: "Allow",
          Action: "sqs:SendMessage",
          Resource: "arn:aws:mock:aws:sqs/queue:Queue:nightly-dlq",
        },
      ],
    });
  });
});

describe("createScriptFunction — logs", () => {
  it("should create the function's log group with retention", () => {
    createScriptFunction("nightly", { codePath: CODE_PATH, logRetentionDays: 30 });

    expect(findResource("aws:cloudwatch/logGroup:LogGroup", "nightly-logs").args).toEqual({
      name: "/aws/lambda/nightly-function",
      retentionInDays: 30,
      tags: {},
    });
  });
});

describe("createScriptFunction — function", () => {
  it("should run the handler on Node.js 20 with default settings", () => {
    createScriptFunction("nightly", { codePath: CODE_PATH, logRetentionDays: 14 });

    const fn = findResource("aws:lambda/function:Function", "nightly-function");
    expect(fn.args).toMatchObject({
      name: "nightly-function",
      role: "arn:aws:mock:aws:iam/role:Role:nightly-role",
      runtime: "nodejs20.x",
      handler: "index.handler",
      code: { path: CODE_PATH },
      timeout: 300,
      memorySize: 256,
      environment: {
        variables: { SCRIPT_PATH: "./script.sh", RAISE_ON_FAILURE: "true" },
      },
      loggingConfig: { logFormat: "Text", logGroup: "/aws/lambda/nightly-function" },
    });
  });

  it("should pass script settings through the environment", () => {
    createScriptFunction("nightly", {
      codePath: CODE_PATH,
      logRetentionDays: 14,
      scriptPath: "./jobs/export.sh",
      raiseOnFailure: false,
      timeoutSeconds: 900,
      memorySize: 1024,
    });

    const fn = findResource("aws:lambda/function:Function", "nightly-function");
    expect(fn.args).toMatchObject({
      timeout: 900,
      memorySize: 1024,
      environment: {
        variables: { SCRIPT_PATH: "./jobs/export.sh", RAISE_ON_FAILURE: "false" },
      },
    });
  });

  it("should be created after its log group", () => {
    const result = createScriptFunction("nightly", { codePath: CODE_PATH, logRetentionDays: 14 });

    const fn = findResource("aws:lambda/function:Function", "nightly-function");
    expect(fn.opts).toEqual({ dependsOn: [result.logGroup] });
  });
});

describe("createScriptFunction — retries", () => {
  it("should retry twice and dead-letter by default", () => {
    createScriptFunction("nightly", { codePath: CODE_PATH, logRetentionDays: 14 });

    const invokeConfig = findResource(
      "aws:lambda/functionEventInvokeConfig:FunctionEventInvokeConfig",
      "nightly-invoke-config",
    );
    expect(invokeConfig.args).toEqual({
      functionName: "nightly-function",
      maximumRetryAttempts: 2,
      maximumEventAgeInSeconds: 21600,
      destinationConfig: {
        onFailure: { destination: "arn:aws:mock:aws:sqs/queue:Queue:nightly-dlq" },
      },
    });
  });

  it("should honour a custom retry count", () => {
    createScriptFunction("nightly", {
      codePath: CODE_PATH,
      logRetentionDays: 14,
      maxRetryAttempts: 0,
    });

    const invokeConfig = findResource(
      "aws:lambda/functionEventInvokeConfig:FunctionEventInvokeConfig",
      "nightly-invoke-config",
    );
    expect(invokeConfig.args.maximumRetryAttempts).toBe(0);
  });

  it("should keep dead letters for 14 days", () => {
    createScriptFunction("nightly", { codePath: CODE_PATH, logRetentionDays: 14 });

    expect(findResource("aws:sqs/queue:Queue", "nightly-dlq").args).toMatchObject({
      messageRetentionSeconds: 1209600,
    });
  });
});

describe("createScriptFunction — schedule", () => {
  it("should not create a trigger without a schedule", () => {
    const result = createScriptFunction("nightly", { codePath: CODE_PATH, logRetentionDays: 14 });

    expect(result.schedule).toBeUndefined();
    expect(listResources("aws:cloudwatch/eventRule:EventRule")).toHaveLength(0);
    expect(listResources("aws:lambda/permission:Permission")).toHaveLength(0);
  });

  it("should wire an EventBridge rule to the function", () => {
    const result = createScriptFunction("nightly", {
      codePath: CODE_PATH,
      logRetentionDays: 14,
      scheduleExpression: "cron(0 2 * * ? *)",
      tags: { team: "data" },
    });

    expect(result.schedule).toBeDefined();
    expect(findResource("aws:cloudwatch/eventRule:EventRule", "nightly-schedule").args).toEqual({
      name: "nightly-schedule",
      scheduleExpression: "cron(0 2 * * ? *)",
      tags: { team: "data" },
    });
    expect(
      findResource("aws:cloudwatch/eventTarget:EventTarget", "nightly-schedule-target").args,
    ).toEqual({
      rule: "nightly-schedule",
      arn: "arn:aws:mock:aws:lambda/function:Function:nightly-function",
    });
    expect(
      findResource("aws:lambda/permission:Permission", "nightly-schedule-invoke").args,
    ).toEqual({
      action: "lambda:InvokeFunction",
      function: "nightly-function",
      principal: "events.amazonaws.com",
      sourceArn: "arn:aws:mock:aws:cloudwatch/eventRule:EventRule:nightly-schedule",
    });
  });
});
