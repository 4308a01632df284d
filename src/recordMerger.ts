import { hasValue } from "./completeness";
import { FieldValue, StoreRecord } from "./shared/types";

function isFalsyOrBlank(value: FieldValue): boolean {
  if (typeof value === "string") return value.trim() === "";
  return !value;
}

/**
 * Fill forward from the previous version of a record. Truthy values in
 * `fresh` always win. A key `fresh` lacks is copied from `previous`; a
 * falsy or blank fresh value (0 and false included) gives way to a previous
 * value that is not itself empty.
 */
export function mergeRecords<T extends StoreRecord>(fresh: T, previous: StoreRecord): T {
  const merged: T = { ...fresh };

  for (const [key, value] of Object.entries(previous)) {
    const missing = !(key in merged);
    if (missing || (isFalsyOrBlank(merged[key]) && hasValue(value))) {
      Object.assign(merged, { [key]: value });
    }
  }

  return merged;
}

export default mergeRecords;
