/**
 * Serializes a bundle and writes it in one step, after assembly has finished
 */

import crypto from "crypto";
import fs from "fs";
import path from "path";
import type { TransactionBundle } from "../../types/bundle.js";
import { IOFailureError } from "../../utils/errors.js";
import { STDOUT } from "../../utils/config-loader.js";
import { logger } from "../../utils/logger.js";
import type { EmitterResult } from "./types.js";

export function serializeBundle(bundle: TransactionBundle): string {
  return `${JSON.stringify(bundle, null, 2)}\n`;
}

export function sha256(content: string): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

/**
 * Write serialized JSON to a file (via a temporary sibling and rename, so a
 * failed write leaves no partial document) or to stdout
 */
export function writeBundle(bundle: TransactionBundle, destination: string): EmitterResult {
  const content = serializeBundle(bundle);
  const result: EmitterResult = {
    destination,
    bytes: Buffer.byteLength(content),
    sha256: sha256(content),
  };

  if (destination === STDOUT) {
    process.stdout.write(content);
    return result;
  }

  const target = path.resolve(destination);
  const temporary = `${target}.${process.pid}.tmp`;
  try {
    fs.writeFileSync(temporary, content, "utf-8");
    fs.renameSync(temporary, target);
  } catch (error) {
    try {
      fs.rmSync(temporary, { force: true });
    } catch (cleanupError) {
      logger.warn("Could not remove temporary file", {
        temporary,
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    }
    throw new IOFailureError(
      `Failed to write bundle to ${destination}`,
      { destination },
      { cause: error },
    );
  }

  logger.debug("Bundle written", { destination, bytes: result.bytes });
  return result;
}
