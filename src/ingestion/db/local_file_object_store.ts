/**
 * ObjectStore over a local directory, used by the local loader script to push
 * an export through the same loader the Lambda runs. The bucket is ignored;
 * keys resolve relative to `rootDir`.
 */
import { promises as fs } from "fs";
import path from "path";
import { IngestionError } from "../errors";
import type { ObjectStore } from "../types/contracts";

export class LocalFileObjectStore implements ObjectStore {
  constructor(private readonly rootDir: string) {}

  resolve(key: string): string {
    const root = path.resolve(this.rootDir);
    const target = path.resolve(root, key);
    if (target !== root && !target.startsWith(`${root}${path.sep}`)) {
      throw new IngestionError(
        `Key ${key} escapes the store root`,
        "ObjectNotFound",
        { key }
      );
    }
    return target;
  }

  async getObject(params: {
    bucket: string;
    key: string;
    maxBytes: number;
  }): Promise<Buffer> {
    const file = this.resolve(params.key);
    let size: number;
    try {
      size = (await fs.stat(file)).size;
    } catch (err) {
      throw new IngestionError(`No such file: ${file}`, "ObjectNotFound", { file }, {
        cause: err,
      });
    }
    if (size > params.maxBytes) {
      throw new IngestionError(
        `File ${file} is ${size} bytes, above the ${params.maxBytes} byte limit`,
        "SizeLimitExceeded",
        { size, limit: params.maxBytes }
      );
    }
    return fs.readFile(file);
  }
}
