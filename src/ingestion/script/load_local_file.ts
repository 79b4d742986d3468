// Load a ride bookings CSV from disk into the warehouse table.
// Loads envs from .env (AWS credentials, STAGE, RIDES_TABLE, ...)
// tsx src/ingestion/script/load_local_file.ts data/rides/2024-03-23.csv [rootDir]
//
// The object name, and with it the batch id, is the file's path relative to
// rootDir (default: the working directory), so re-running a file is a no-op.
import "dotenv/config";
import path from "path";
import { Deadline } from "../business/deadline";
import { loadObject } from "../business/load_object";
import {
  DEFAULT_INVOCATION_TIMEOUT_MS,
  DEFAULT_MAX_OBJECT_BYTES,
} from "../config";
import { DynamoWarehouseTable } from "../db/dynamo_warehouse_table";
import { LocalFileObjectStore } from "../db/local_file_object_store";
import { DynamoTable, getDynamoTableName } from "@src/util/dynamodb";
import { getNumber, getString } from "@src/util/env";

async function main() {
  const [file, rootArg] = process.argv.slice(2);
  if (!file) {
    throw new Error("usage: load_local_file <path/to/file.csv> [rootDir]");
  }
  const rootDir = path.resolve(rootArg ?? process.cwd());
  const objectName = path
    .relative(rootDir, path.resolve(file))
    .split(path.sep)
    .join("/");
  const tableId = getString(
    "RIDES_TABLE",
    getDynamoTableName(DynamoTable.RideBookings)
  );

  const result = await loadObject(
    { bucket: "local", objectName },
    {
      objectStore: new LocalFileObjectStore(rootDir),
      warehouse: new DynamoWarehouseTable({ tableName: tableId }),
      config: {
        tableId,
        maxObjectBytes: getNumber("MAX_OBJECT_BYTES", DEFAULT_MAX_OBJECT_BYTES),
      },
      deadline: Deadline.after(
        getNumber("INVOCATION_TIMEOUT_MS", DEFAULT_INVOCATION_TIMEOUT_MS)
      ),
    }
  );
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(result, null, 2));
  if (result.status === "Retryable" || result.status === "Permanent") {
    process.exitCode = 1;
  }
}

main().catch(err => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
