import { randomUUID } from "node:crypto";
import {
  InteractionHistory,
  InteractionInput,
  InteractionRecord,
} from "../../domain/stores.js";

export class InMemoryInteractionHistory implements InteractionHistory {
  private records: InteractionRecord[] = [];

  constructor(
    private readonly maxRecords = 1000,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async record(interaction: InteractionInput): Promise<InteractionRecord> {
    const record: InteractionRecord = {
      id: randomUUID(),
      question: interaction.question,
      answer: interaction.answer,
      sources: interaction.sources.map((source) => ({ ...source })),
      createdAt: this.now().toISOString(),
    };
    this.records.push(record);
    if (this.records.length > this.maxRecords) {
      this.records.splice(0, this.records.length - this.maxRecords);
    }
    return record;
  }

  /** Newest first. */
  async recent(limit: number): Promise<InteractionRecord[]> {
    if (limit <= 0) {
      return [];
    }
    return this.records.slice(-Math.floor(limit)).reverse();
  }
}
