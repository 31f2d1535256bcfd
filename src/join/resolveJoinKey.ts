export type EntityInfo = {
  name: string;
  shortName?: string;
  type?: string;
};

export type EntityData = Record<string, EntityInfo>;

/** Display name (or short name) -> every entity id registered under it. */
export type NameIndex = Map<string, string[]>;

export type JoinResult =
  | { status: "resolved"; id: string; via: "embedded_id" | "name" }
  | { status: "unresolved"; key: string };

const EMBEDDED_ID_RE = /\d{6,}/g;

export function buildNameIndex(entities: EntityData): NameIndex {
  const index: NameIndex = new Map();
  for (const [id, entity] of Object.entries(entities)) {
    for (const raw of [entity.name, entity.shortName]) {
      const name = (raw ?? "").trim();
      if (!name) continue;
      const ids = index.get(name) ?? [];
      if (!ids.includes(id)) ids.push(id);
      index.set(name, ids);
    }
  }
  return index;
}

export function embeddedIds(joinKey: string): string[] {
  return joinKey.match(EMBEDDED_ID_RE) ?? [];
}

/**
 * Maps a free-text join key (UTM tag, banner id, ...) to a known entity id.
 *
 * An embedded numeric id that names a known entity always wins. Otherwise the
 * key must equal exactly one entity's name or short name; ambiguous names are
 * refused.
 */
export function resolveJoinKey(joinKey: string, entities: EntityData, index: NameIndex): JoinResult {
  const key = (joinKey ?? "").trim();
  if (!key) return { status: "unresolved", key };

  for (const candidate of embeddedIds(key)) {
    if (Object.hasOwn(entities, candidate)) {
      return { status: "resolved", id: candidate, via: "embedded_id" };
    }
  }

  const ids = index.get(key) ?? [];
  if (ids.length === 1) return { status: "resolved", id: ids[0], via: "name" };

  return { status: "unresolved", key };
}
