import { AdmittedItem, ProcessedItem } from "@/lib/domain/models";
import { DigestRules } from "@/lib/domain/rules";
import { classify } from "@/lib/process/classify";
import { suggestReplyOpener } from "@/lib/process/reply-opener";
import { score } from "@/lib/process/score";

export function enrichItem(item: AdmittedItem, rules: DigestRules): ProcessedItem {
  const category = classify(item, rules.classifier);
  const { priority, signals } = score(item, category, rules.scoring);
  return {
    ...item,
    category,
    priority,
    signals,
    replyOpener: suggestReplyOpener(item.title, category, rules.replyOpeners),
  };
}
