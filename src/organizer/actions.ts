import type { Urgency } from "../store/types.js";
import type { FlagDue, TagAction } from "./types.js";

const FLAG_BY_URGENCY: Record<Urgency, FlagDue | null> = {
  immediate: "today",
  today: "today",
  this_week: "this_week",
  someday: null,
};

export function flagFor(urgency: Urgency): TagAction["flag"] {
  const due = FLAG_BY_URGENCY[urgency];
  return due ? { status: "flagged", due } : null;
}

/**
 * Orders categories by configured priority so the primary category is
 * deterministic when the classifier returns several. Unknown categories keep
 * their relative order after the known ones. Duplicates are dropped.
 */
export function rankCategories(categories: readonly string[], priority: readonly string[]): string[] {
  const unique = [...new Set(categories)];
  const rank = (name: string): number => {
    const idx = priority.indexOf(name);
    return idx === -1 ? priority.length : idx;
  };
  return unique
    .map((name, position) => ({ name, position }))
    .sort((a, b) => rank(a.name) - rank(b.name) || a.position - b.position)
    .map((entry) => entry.name);
}

/** The single provider action for a classified message, or null when there is nothing to apply. */
export function buildTagAction(categories: readonly string[], urgency: Urgency): TagAction | null {
  const flag = flagFor(urgency);
  if (categories.length === 0 && flag === null) return null;
  return { type: "tag", categories, flag };
}
