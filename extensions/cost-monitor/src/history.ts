/**
 * Single-value cost history files (`last-cost.txt`, `last-daily-total.txt`).
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import Decimal from "decimal.js-light";

import type { Logger } from "../../../src/logging/logger.js";
import { errorMessage } from "./errors.js";

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;

export class CostHistoryFile {
  constructor(
    readonly filePath: string,
    private readonly logger?: Logger,
  ) {}

  /** The recorded amount, or undefined when absent or unparseable. */
  async read(): Promise<Decimal | undefined> {
    let text: string;
    try {
      text = (await readFile(this.filePath, "utf8")).trim();
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return undefined;
      this.logger?.warn(`Could not read ${this.filePath}: ${errorMessage(err)}`);
      return undefined;
    }
    if (!AMOUNT_PATTERN.test(text)) {
      this.logger?.warn(`Ignoring unparseable cost history value ${JSON.stringify(text)}`, { path: this.filePath });
      return undefined;
    }
    return new Decimal(text);
  }

  async write(amount: Decimal): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${amount.toFixed(2)}\n`, "utf8");
  }
}
