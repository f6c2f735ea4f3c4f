import projectileTypeData from "./projectile-types.json";
import { isObject, readString } from "./protocol";

export interface ProjectileTypeRule {
  readonly type: string;
  readonly keywords: readonly string[];
}

export interface ProjectileTypeTable {
  readonly fallback: string;
  readonly rules: readonly ProjectileTypeRule[];
}

export const normalizeProjectileTypeTable = (value: unknown, context: string): ProjectileTypeTable => {
  if (!isObject(value)) {
    throw new Error(`${context} must be an object.`);
  }
  const types = value.types;
  if (!Array.isArray(types)) {
    throw new Error(`${context}.types must be an array.`);
  }
  const rules = types.map((entry, index): ProjectileTypeRule => {
    const entryContext = `${context}.types[${index}]`;
    if (!isObject(entry) || !Array.isArray(entry.keywords)) {
      throw new Error(`${entryContext} must be an object with a keywords array.`);
    }
    return {
      type: readString(entry.type, `${entryContext}.type`),
      keywords: entry.keywords.map((keyword, keywordIndex) =>
        readString(keyword, `${entryContext}.keywords[${keywordIndex}]`).toLowerCase(),
      ),
    };
  });
  return { fallback: readString(value.fallback, `${context}.fallback`), rules };
};

export const DEFAULT_PROJECTILE_TYPES: ProjectileTypeTable = normalizeProjectileTypeTable(
  projectileTypeData,
  "projectile-types.json",
);

/** First rule with a keyword contained in the unit name wins. */
export const resolveProjectileType = (
  unitName: string,
  table: ProjectileTypeTable = DEFAULT_PROJECTILE_TYPES,
): string => {
  const name = unitName.toLowerCase();
  for (const rule of table.rules) {
    if (rule.keywords.some((keyword) => name.includes(keyword))) {
      return rule.type;
    }
  }
  return table.fallback;
};
