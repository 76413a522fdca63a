/*
  Create the delivery ledger table on DynamoDB Local (or any DYNAMO_ENDPOINT)
  and enable TTL on expiresAt. Safe to re-run.
  Usage:
    npx tsx tools/dynamo/bootstrap-local.ts
*/

import "dotenv/config";

import {
  CreateTableCommand,
  DescribeTableCommand,
  DynamoDBClient,
  ResourceNotFoundException,
  UpdateTimeToLiveCommand,
  waitUntilTableExists,
} from "@aws-sdk/client-dynamodb";
import { loadConfig } from "../../src/config/config";
import { errorMessage } from "../../src/domain/errors";

const LEDGER_TTL_ATTRIBUTE = "expiresAt";

async function main() {
  const { dynamo } = loadConfig();
  const endpoint = dynamo.endpoint ?? "http://localhost:8000";
  const tableName = dynamo.tableName ?? "UnitsSummaryLedger";
  console.log(`[dynamo] endpoint=${endpoint} table=${tableName}`);

  const client = new DynamoDBClient({
    region: dynamo.region ?? "us-west-2",
    endpoint,
    // DynamoDB Local accepts any credentials
    credentials: {
      accessKeyId: process.env.AWS_ACCESS_KEY_ID || "local",
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY || "local",
    },
  });

  try {
    await client.send(new DescribeTableCommand({ TableName: tableName }));
    console.log("[dynamo] table exists");
    return;
  } catch (err) {
    if (!(err instanceof ResourceNotFoundException)) throw err;
  }

  await client.send(
    new CreateTableCommand({
      TableName: tableName,
      AttributeDefinitions: [{ AttributeName: "pk", AttributeType: "S" }],
      KeySchema: [{ AttributeName: "pk", KeyType: "HASH" }],
      BillingMode: "PAY_PER_REQUEST",
    })
  );
  await waitUntilTableExists({ client, maxWaitTime: 30 }, { TableName: tableName });
  await client.send(
    new UpdateTimeToLiveCommand({
      TableName: tableName,
      TimeToLiveSpecification: { AttributeName: LEDGER_TTL_ATTRIBUTE, Enabled: true },
    })
  );
  console.log("[dynamo] table created with TTL on", LEDGER_TTL_ATTRIBUTE);
}

main().catch((e: unknown) => {
  console.error("[dynamo] error:", errorMessage(e));
  process.exitCode = 1;
});
