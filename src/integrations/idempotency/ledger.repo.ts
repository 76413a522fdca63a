import { GetCommand, PutCommand } from "@aws-sdk/lib-dynamodb";
import { AppConfig } from "../../config/config";
import { DateKey } from "../../domain/types";
import { getDynamoDocClient } from "./dynamo.sdk";

export interface DeliveryLedger {
  hasDelivered(key: string): Promise<boolean>;
  // false when another run recorded the key first
  markDelivered(key: string): Promise<boolean>;
}

export function deliveryKey(vendorNumber: string, runDate: DateKey): string {
  return `units-summary:${vendorNumber}:${runDate}`;
}

function errorName(err: unknown): string {
  return typeof err === "object" && err !== null && "name" in err && typeof err.name === "string" ? err.name : "";
}

/** DynamoDB-backed ledger; null when no table is configured. */
export function createDynamoLedger(cfg: AppConfig["dynamo"]): DeliveryLedger | null {
  const tableName = cfg.tableName;
  if (!tableName) return null;
  const ttlDays = cfg.ttlDays ?? 14;

  return {
    async hasDelivered(key) {
      const doc = getDynamoDocClient(cfg);
      const out = await doc.send(new GetCommand({ TableName: tableName, Key: { pk: key } }));
      return Boolean(out.Item);
    },

    async markDelivered(key) {
      const nowSec = Math.floor(Date.now() / 1000);
      const doc = getDynamoDocClient(cfg);
      try {
        await doc.send(
          new PutCommand({
            TableName: tableName,
            Item: {
              pk: key,
              seenAt: new Date().toISOString(),
              expiresAt: nowSec + ttlDays * 86400,
            },
            ConditionExpression: "attribute_not_exists(pk)",
          })
        );
        return true;
      } catch (err) {
        if (errorName(err) === "ConditionalCheckFailedException") return false;
        throw err;
      }
    },
  };
}
