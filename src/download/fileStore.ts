import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { DestinationError, errorMessage } from "../core/errors";
import { TariffId } from "../types";

export interface FileStore {
  exists(filePath: string): Promise<boolean>;
  tempPath(finalPath: string): string;
  writeAtomic(finalPath: string, bytes: Buffer): Promise<void>;
  ensureWritable(dir: string): Promise<void>;
}

/**
 * Stable file name for a tariff id. The readable part is sanitized; the hash
 * of the raw id keeps ids that sanitize alike apart.
 */
export function tariffFileName(tariffId: TariffId): string {
  const readable = tariffId.replace(/[^A-Za-z0-9._-]+/g, "_").replace(/^\.+/, "_").slice(0, 80);
  const hash = crypto.createHash("sha256").update(tariffId).digest("hex").slice(0, 8);
  return `tariff_${readable}_${hash}.xml`;
}

export class NodeFileStore implements FileStore {
  async exists(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.promises.stat(filePath);
      return stat.isFile();
    } catch {
      return false;
    }
  }

  tempPath(finalPath: string): string {
    return `${finalPath}.${crypto.randomBytes(4).toString("hex")}.part`;
  }

  async writeAtomic(finalPath: string, bytes: Buffer): Promise<void> {
    const tempPath = this.tempPath(finalPath);
    try {
      await fs.promises.writeFile(tempPath, bytes, { flag: "wx" });
      await this.commit(tempPath, finalPath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw new DestinationError(`could not write ${finalPath}: ${errorMessage(error)}`, finalPath);
    }
  }

  async ensureWritable(dir: string): Promise<void> {
    const absolute = path.resolve(dir);
    try {
      await fs.promises.mkdir(absolute, { recursive: true });
      await fs.promises.access(absolute, fs.constants.W_OK);
    } catch (error) {
      throw new DestinationError(`destination folder is not writable: ${errorMessage(error)}`, absolute);
    }
  }

  protected async commit(tempPath: string, finalPath: string): Promise<void> {
    await fs.promises.rename(tempPath, finalPath);
  }
}
