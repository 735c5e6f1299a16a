import { readFile } from "node:fs/promises";
import type { Aoi, AoiRecord } from "../../core/aoi/aoi.types";
import { parseAoiRecords } from "../../core/aoi/parseAoi";
import { ConfigError } from "../../core/errors/syncErrors";
import type { AoiRegistry } from "../../ports/AoiRegistry";
import { errorMessage } from "../../shared/logging/log";

const isRecord = (value: unknown): value is AoiRecord =>
  typeof value === "object" && value != null && !Array.isArray(value);

/**
 * City list kept as a JSON file: either an array of records or `{ "cities": [...] }`.
 */
export class FileAoiRegistry implements AoiRegistry {
  constructor(private readonly filePath: string) {}

  async loadSnapshot(): Promise<Aoi[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Cannot read AOI file ${this.filePath}: ${errorMessage(err)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new ConfigError(`AOI file ${this.filePath} is not valid JSON: ${errorMessage(err)}`);
    }

    const list = Array.isArray(parsed) ? parsed : isRecord(parsed) ? parsed.cities : undefined;
    if (!Array.isArray(list)) {
      throw new ConfigError(`AOI file ${this.filePath} must hold an array of records or { "cities": [...] }`);
    }

    const records = list.map((item: unknown, index: number) => {
      if (!isRecord(item)) {
        throw new ConfigError(`AOI record #${index} in ${this.filePath} is not an object`);
      }
      return item;
    });
    return parseAoiRecords(records, this.filePath);
  }
}
