import { DynamoDBClient, DynamoDBClientConfig } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import { AppConfig } from "../../config/config";

let cachedDoc: DynamoDBDocumentClient | null = null;

export function getDynamoDocClient(cfg: AppConfig["dynamo"]): DynamoDBDocumentClient {
  if (cachedDoc) return cachedDoc;
  const clientConfig: DynamoDBClientConfig = {
    region: cfg.region || process.env.AWS_REGION || "us-west-2",
  };
  if (cfg.endpoint) {
    // DynamoDB Local accepts any credentials
    clientConfig.endpoint = cfg.endpoint;
    clientConfig.credentials = {
      accessKeyId: process.env.AWS_ACCESS_KEY_ID || "fakeMyKeyId",
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY || "fakeSecretAccessKey",
    };
  }
  cachedDoc = DynamoDBDocumentClient.from(new DynamoDBClient(clientConfig));
  return cachedDoc;
}
