import { toStringOr, type Session } from "./driver.js";
import type { Setting } from "../types.js";

export async function getSetting(
  session: Session,
  key: string,
): Promise<string | null> {
  const result = await session.executeRead(async (tx) => {
    return tx.run(`MATCH (s:Setting {key: $key}) RETURN s.value AS value`, {
      key,
    });
  });

  if (result.records.length === 0) return null;
  const value: unknown = result.records[0].get("value");
  return value === null || value === undefined ? null : String(value);
}

export async function listSettings(session: Session): Promise<Setting[]> {
  const result = await session.executeRead(async (tx) => {
    return tx.run(
      `MATCH (s:Setting) RETURN s.key AS key, s.value AS value ORDER BY s.key`,
    );
  });

  return result.records.map((record) => ({
    key: toStringOr(record.get("key"), ""),
    value: toStringOr(record.get("value"), ""),
  }));
}

export async function setSetting(
  session: Session,
  key: string,
  value: string,
): Promise<void> {
  await session.executeWrite(async (tx) => {
    await tx.run(
      `MERGE (s:Setting {key: $key})
       SET s.value = $value, s.updatedAt = $now`,
      { key, value, now: new Date().toISOString() },
    );
  });
}
