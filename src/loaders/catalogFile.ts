import { readFile } from "fs/promises";
import path from "path";
import { parse } from "yaml";
import type Joi from "joi";
import { CatalogFormatError } from "../types/response/error.response";

/**
 * Read a YAML file holding a list of records and validate each one.
 * An empty document is an empty list.
 */
export async function readRecordList<T>(
  filePath: string,
  schema: Joi.ObjectSchema<T>
): Promise<T[]> {
  const file = path.basename(filePath);
  const content = await readFile(filePath, "utf-8");

  let document: unknown;
  try {
    document = parse(content);
  } catch (error) {
    throw new CatalogFormatError(
      file,
      error instanceof Error ? error.message : "invalid YAML"
    );
  }

  if (document === null || document === undefined) return [];
  if (!Array.isArray(document)) {
    throw new CatalogFormatError(file, "expected a list of records");
  }

  return document.map((record: unknown, index) => {
    const { error, value } = schema.validate(record, { convert: true });
    if (error) {
      throw new CatalogFormatError(file, `record ${index}: ${error.message}`);
    }
    return value;
  });
}

export function assertUniqueIds(file: string, records: readonly { id: number }[]): void {
  const seen = new Set<number>();
  for (const record of records) {
    if (seen.has(record.id)) {
      throw new CatalogFormatError(path.basename(file), `duplicate id ${record.id}`);
    }
    seen.add(record.id);
  }
}
