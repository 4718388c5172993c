import { AdmittedItem, Category, ScoreResult } from "@/lib/domain/models";
import { AgeTiers, ScoringRules } from "@/lib/domain/rules";
import { containsAny } from "@/lib/process/classify";

export type ScorableItem = Pick<AdmittedItem, "title" | "feed" | "ageHours">;

interface AgeTier {
  points: number;
  label: string | null;
}

function ageTier(ageHours: number, tiers: AgeTiers): AgeTier {
  if (ageHours <= tiers.freshMaxHours) return { points: tiers.freshBonus, label: "fresh" };
  if (ageHours <= tiers.recentMaxHours) return { points: tiers.recentBonus, label: "recent" };
  if (ageHours <= tiers.warmMaxHours) return { points: tiers.warmBonus, label: null };
  if (ageHours >= tiers.oldMinHours) return { points: -tiers.oldPenalty, label: "old" };
  return { points: 0, label: null };
}

/**
 * Additive rule table. Each triggered rule adds its weight and a signal label;
 * signals keep first-trigger order, are deduplicated and capped.
 * `category` is part of the contract for rule tables that weight it; the
 * default table does not.
 */
export function score(item: ScorableItem, _category: Category, rules: ScoringRules): ScoreResult {
  const title = item.title.toLowerCase();
  let priority = 0;
  const signals: string[] = [];

  const trigger = (points: number, label: string | null) => {
    priority += points;
    if (label && !signals.includes(label)) {
      signals.push(label);
    }
  };

  if (item.title.includes("?")) {
    trigger(rules.questionWeight, "question");
  }

  for (const entry of rules.lexicon) {
    if (title.includes(entry.term.toLowerCase())) {
      trigger(entry.weight, entry.tag);
    }
  }

  if (containsAny(item.feed, rules.targetFeedPatterns)) {
    trigger(rules.targetFeedBonus, "target-feed");
  }

  if (containsAny(title, rules.megathreadMarkers)) {
    trigger(-rules.megathreadPenalty, "megathread");
  }

  const tier = ageTier(item.ageHours, rules.age);
  trigger(tier.points, tier.label);

  return { priority, signals: signals.slice(0, rules.maxSignals) };
}
