import { Category } from "@/lib/domain/models";

export interface ClassifierRules {
  creator: string[];
  supporter: string[];
  media: string[];
}

export interface LexiconEntry {
  term: string;
  weight: number;
  tag: string;
}

export interface AgeTiers {
  freshMaxHours: number;
  freshBonus: number;
  recentMaxHours: number;
  recentBonus: number;
  warmMaxHours: number;
  warmBonus: number;
  oldMinHours: number;
  oldPenalty: number;
}

export interface ScoringRules {
  questionWeight: number;
  maxSignals: number;
  lexicon: LexiconEntry[];
  targetFeedPatterns: string[];
  targetFeedBonus: number;
  megathreadMarkers: string[];
  megathreadPenalty: number;
  age: AgeTiers;
}

export interface SectionRules {
  highPriorityMin: number;
  highPriorityMaxAgeHours: number;
  cap: number;
  titles: Record<string, string>;
}

export interface ReplyOpenerRule {
  category: Category;
  terms: string[];
  text: string;
}

export interface ReportRules {
  subjectPrefix: string;
  introLines: string[];
}

export interface DigestRules {
  classifier: ClassifierRules;
  scoring: ScoringRules;
  sections: SectionRules;
  replyOpeners: ReplyOpenerRule[];
  report: ReportRules;
}
