import {
  Category,
  CATEGORY_CREATOR,
  CATEGORY_GENERAL,
  CATEGORY_MEDIA,
  CATEGORY_SUPPORTER,
} from "@/lib/domain/models";
import { ClassifierRules } from "@/lib/domain/rules";

export interface ClassifiableItem {
  title: string;
  feed: string;
}

type CategoryRule = [keywords: (rules: ClassifierRules) => string[], category: Category];

// Evaluated top to bottom, first match wins.
const CATEGORY_RULES: CategoryRule[] = [
  [(rules) => rules.creator, CATEGORY_CREATOR],
  [(rules) => rules.supporter, CATEGORY_SUPPORTER],
  [(rules) => rules.media, CATEGORY_MEDIA],
];

export function containsAny(haystack: string, needles: string[]): boolean {
  const text = haystack.toLowerCase();
  return needles.some((needle) => needle && text.includes(needle.toLowerCase()));
}

/** Plain substring match on feed label or title, so a keyword inside a longer word still counts. */
export function classify(item: ClassifiableItem, rules: ClassifierRules): Category {
  for (const [keywords, category] of CATEGORY_RULES) {
    const terms = keywords(rules);
    if (containsAny(item.feed, terms) || containsAny(item.title, terms)) {
      return category;
    }
  }
  return CATEGORY_GENERAL;
}
