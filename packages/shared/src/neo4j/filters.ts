// =============================================================================
// @feedsieve/shared: Filter configuration Neo4j operations
// =============================================================================
// :EntryFilter nodes hold patterns. :FilterGroup nodes own ordered
// :FilterRule nodes via HAS_RULE; a rule refers to its filter by id only and
// the filter is joined at read time, so deleting a filter leaves the rule in
// place with a null filter.
// =============================================================================

import crypto from "node:crypto";
import {
  nodeProps,
  toBoolean,
  toNumber,
  toStringOr,
  type Session,
} from "./driver.js";
import type {
  EntryFilter,
  EntryFilterInput,
  FilterAction,
  FilterGroup,
  FilterGroupInput,
  FilterGroupRule,
  FilterGroupRuleInput,
} from "../types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toEntryFilter(props: Record<string, unknown>): EntryFilter {
  return {
    id: toStringOr(props.id, ""),
    name: toStringOr(props.name, ""),
    pattern: toStringOr(props.pattern, ""),
    patternType: toStringOr(props.patternType, ""),
    targetType: toStringOr(props.targetType, ""),
    caseSensitive: toBoolean(props.caseSensitive),
    createdAt: toStringOr(props.createdAt, ""),
    updatedAt: toStringOr(props.updatedAt, ""),
  };
}

function toFilterAction(value: unknown): FilterAction {
  return value === "keep" ? "keep" : "discard";
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Maps one element of the collected `rules` list to a FilterGroupRule. */
function toFilterGroupRule(raw: unknown): FilterGroupRule | null {
  if (!isObject(raw)) return null;
  const filterNode = raw.filter;
  return {
    filterId: toStringOr(raw.filterId, ""),
    operator: toStringOr(raw.operator, ""),
    position: toNumber(raw.position),
    filter:
      isObject(filterNode) && isObject(filterNode.properties)
        ? toEntryFilter(filterNode.properties)
        : null,
  };
}

function toFilterGroup(
  props: Record<string, unknown>,
  rawRules: unknown,
): FilterGroup {
  const rules = Array.isArray(rawRules)
    ? rawRules
        .map(toFilterGroupRule)
        .filter((rule): rule is FilterGroupRule => rule !== null)
        .sort((a, b) => a.position - b.position)
    : [];

  return {
    id: toStringOr(props.id, ""),
    name: toStringOr(props.name, ""),
    action: toFilterAction(props.action),
    isActive: toBoolean(props.isActive),
    priority: toNumber(props.priority),
    applyToCategory: toStringOr(props.applyToCategory, ""),
    rules,
    createdAt: toStringOr(props.createdAt, ""),
    updatedAt: toStringOr(props.updatedAt, ""),
  };
}

/** Groups with their rules joined to filters, ordered by priority then name. */
function groupQuery(whereClause: string): string {
  return `MATCH (g:FilterGroup)
   ${whereClause}
   OPTIONAL MATCH (g)-[:HAS_RULE]->(r:FilterRule)
   OPTIONAL MATCH (flt:EntryFilter {id: r.filterId})
   WITH g, r, flt ORDER BY r.position
   WITH g, collect(CASE WHEN r IS NULL THEN null ELSE {
     filterId: r.filterId,
     operator: r.operator,
     position: r.position,
     filter: flt
   } END) AS rules
   RETURN g, rules
   ORDER BY g.priority, g.name`;
}

async function readGroups(
  session: Session,
  whereClause: string,
  params: Record<string, unknown> = {},
): Promise<FilterGroup[]> {
  const result = await session.executeRead(async (tx) => {
    return tx.run(groupQuery(whereClause), params);
  });

  return result.records.map((record) =>
    toFilterGroup(nodeProps(record, "g"), record.get("rules")),
  );
}

// ---------------------------------------------------------------------------
// Filter groups (read side used by the filter engine)
// ---------------------------------------------------------------------------

export async function getActiveFilterGroups(
  session: Session,
): Promise<FilterGroup[]> {
  return readGroups(session, "WHERE g.isActive = true");
}

export async function listFilterGroups(
  session: Session,
): Promise<FilterGroup[]> {
  return readGroups(session, "");
}

export async function getFilterGroup(
  session: Session,
  id: string,
): Promise<FilterGroup | null> {
  const groups = await readGroups(session, "WHERE g.id = $id", { id });
  return groups[0] ?? null;
}

// ---------------------------------------------------------------------------
// Entry filters
// ---------------------------------------------------------------------------

export async function listFilters(session: Session): Promise<EntryFilter[]> {
  const result = await session.executeRead(async (tx) => {
    return tx.run(`MATCH (flt:EntryFilter) RETURN flt ORDER BY flt.name`);
  });

  return result.records.map((record) =>
    toEntryFilter(nodeProps(record, "flt")),
  );
}

export async function getFilter(
  session: Session,
  id: string,
): Promise<EntryFilter | null> {
  const result = await session.executeRead(async (tx) => {
    return tx.run(`MATCH (flt:EntryFilter {id: $id}) RETURN flt`, { id });
  });

  if (result.records.length === 0) return null;
  return toEntryFilter(nodeProps(result.records[0], "flt"));
}

export async function createFilter(
  session: Session,
  input: EntryFilterInput,
): Promise<EntryFilter> {
  const now = new Date().toISOString();

  const result = await session.executeWrite(async (tx) => {
    return tx.run(
      `CREATE (flt:EntryFilter {
        id: $id,
        name: $name,
        pattern: $pattern,
        patternType: $patternType,
        targetType: $targetType,
        caseSensitive: $caseSensitive,
        createdAt: $now,
        updatedAt: $now
      }) RETURN flt`,
      { id: crypto.randomUUID(), ...input, now },
    );
  });

  return toEntryFilter(nodeProps(result.records[0], "flt"));
}

export async function updateFilter(
  session: Session,
  id: string,
  input: EntryFilterInput,
): Promise<EntryFilter | null> {
  const result = await session.executeWrite(async (tx) => {
    return tx.run(
      `MATCH (flt:EntryFilter {id: $id})
       SET flt.name = $name,
           flt.pattern = $pattern,
           flt.patternType = $patternType,
           flt.targetType = $targetType,
           flt.caseSensitive = $caseSensitive,
           flt.updatedAt = $now
       RETURN flt`,
      { id, ...input, now: new Date().toISOString() },
    );
  });

  if (result.records.length === 0) return null;
  return toEntryFilter(nodeProps(result.records[0], "flt"));
}

export async function deleteFilter(
  session: Session,
  id: string,
): Promise<boolean> {
  const result = await session.executeWrite(async (tx) => {
    return tx.run(
      `MATCH (flt:EntryFilter {id: $id})
       DETACH DELETE flt
       RETURN count(*) AS deleted`,
      { id },
    );
  });

  return toNumber(result.records[0]?.get("deleted")) > 0;
}

// ---------------------------------------------------------------------------
// Filter group CRUD
// ---------------------------------------------------------------------------

export async function createFilterGroup(
  session: Session,
  input: FilterGroupInput,
): Promise<FilterGroup> {
  const now = new Date().toISOString();

  const result = await session.executeWrite(async (tx) => {
    return tx.run(
      `CREATE (g:FilterGroup {
        id: $id,
        name: $name,
        action: $action,
        isActive: $isActive,
        priority: $priority,
        applyToCategory: $applyToCategory,
        createdAt: $now,
        updatedAt: $now
      }) RETURN g`,
      { id: crypto.randomUUID(), ...input, now },
    );
  });

  return toFilterGroup(nodeProps(result.records[0], "g"), []);
}

export async function updateFilterGroup(
  session: Session,
  id: string,
  input: FilterGroupInput,
): Promise<FilterGroup | null> {
  const result = await session.executeWrite(async (tx) => {
    return tx.run(
      `MATCH (g:FilterGroup {id: $id})
       SET g.name = $name,
           g.action = $action,
           g.isActive = $isActive,
           g.priority = $priority,
           g.applyToCategory = $applyToCategory,
           g.updatedAt = $now
       RETURN g`,
      { id, ...input, now: new Date().toISOString() },
    );
  });

  if (result.records.length === 0) return null;
  return getFilterGroup(session, id);
}

/** Deletes the group and its rules; the referenced filters stay. */
export async function deleteFilterGroup(
  session: Session,
  id: string,
): Promise<boolean> {
  const result = await session.executeWrite(async (tx) => {
    await tx.run(
      `MATCH (:FilterGroup {id: $id})-[:HAS_RULE]->(r:FilterRule)
       DETACH DELETE r`,
      { id },
    );
    return tx.run(
      `MATCH (g:FilterGroup {id: $id})
       DETACH DELETE g
       RETURN count(*) AS deleted`,
      { id },
    );
  });

  return toNumber(result.records[0]?.get("deleted")) > 0;
}

/** Replaces every rule of the group in one transaction. */
export async function setGroupRules(
  session: Session,
  groupId: string,
  rules: FilterGroupRuleInput[],
): Promise<boolean> {
  return session.executeWrite(async (tx) => {
    const existing = await tx.run(
      `MATCH (g:FilterGroup {id: $id})
       SET g.updatedAt = $now
       RETURN g`,
      { id: groupId, now: new Date().toISOString() },
    );
    if (existing.records.length === 0) return false;

    await tx.run(
      `MATCH (:FilterGroup {id: $id})-[:HAS_RULE]->(r:FilterRule)
       DETACH DELETE r`,
      { id: groupId },
    );

    await tx.run(
      `MATCH (g:FilterGroup {id: $id})
       UNWIND $rules AS rule
       CREATE (g)-[:HAS_RULE]->(:FilterRule {
         filterId: rule.filterId,
         operator: rule.operator,
         position: rule.position
       })`,
      {
        id: groupId,
        rules: rules.map((rule) => ({
          filterId: rule.filterId,
          operator: rule.operator,
          position: rule.position,
        })),
      },
    );

    return true;
  });
}
