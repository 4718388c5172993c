import { Category } from "@/lib/domain/models";
import { ReplyOpenerRule } from "@/lib/domain/rules";

export function suggestReplyOpener(title: string, category: Category, rules: ReplyOpenerRule[]): string | null {
  const lowered = title.toLowerCase();
  for (const rule of rules) {
    if (rule.category !== category) continue;
    if (rule.terms.length && !rule.terms.some((term) => lowered.includes(term.toLowerCase()))) continue;
    return rule.text;
  }
  return null;
}
