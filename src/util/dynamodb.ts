import { getStage } from "./env";

export enum DynamoTable {
  RideBookings = "RideBookings",
}

interface GetDynamoTableNameOptions {
  appName?: string;
  stage?: string;
}

const TABLE_SUFFIX: Record<DynamoTable, string> = {
  [DynamoTable.RideBookings]: "RideBookingsTable",
};

export function resolveAppName(): string {
  // APP_NAME doubles as the project identifier of the warehouse
  return process.env.APP_NAME || "rideshare-ingest";
}

export function getDynamoTableName(
  table: DynamoTable,
  options: GetDynamoTableNameOptions = {}
): string {
  const appName = options.appName ?? resolveAppName();
  const stage = options.stage ?? getStage();
  return `${appName}-${stage}-${TABLE_SUFFIX[table]}`;
}
