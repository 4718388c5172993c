import { RawItem, ReportMessage, SourceConfig } from "@/lib/domain/models";

/** Supplies at most `limit` entries for one configured query; an empty list when the source is unavailable. */
export interface SourceCollaborator {
  fetchItems(source: SourceConfig, limit: number): Promise<RawItem[]>;
}

/** Resolves once the report is handed off; rejects with a DeliveryError otherwise. */
export interface DeliveryCollaborator {
  deliver(message: ReportMessage): Promise<void>;
}
