import { ProcessedItem } from "@/lib/domain/models";

/** Priority descending, then freshest first; exact ties keep discovery order. */
export function rankItems(items: ProcessedItem[]): ProcessedItem[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => {
      if (b.item.priority !== a.item.priority) return b.item.priority - a.item.priority;
      if (a.item.ageHours !== b.item.ageHours) return a.item.ageHours - b.item.ageHours;
      return a.index - b.index;
    })
    .map(({ item }) => item);
}
