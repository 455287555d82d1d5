import { DocumentStore, StoredDocument } from "../../domain/stores.js";
import { DocumentInput } from "../../domain/types.js";

export class InMemoryDocumentStore implements DocumentStore {
  private documents = new Map<string, StoredDocument>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async upsertDocuments(documents: DocumentInput[]): Promise<number> {
    const timestamp = this.now().toISOString();
    for (const document of documents) {
      const existing = this.documents.get(document.id);
      this.documents.set(document.id, {
        id: document.id,
        text: document.text,
        metadata: document.metadata ?? { source: "manual" },
        createdAt: existing?.createdAt ?? timestamp,
        updatedAt: timestamp,
      });
    }
    return documents.length;
  }

  async getTexts(ids: string[]): Promise<Map<string, string>> {
    const texts = new Map<string, string>();
    for (const id of ids) {
      const document = this.documents.get(id);
      if (document) {
        texts.set(id, document.text);
      }
    }
    return texts;
  }

  async count(): Promise<number> {
    return this.documents.size;
  }

  get(id: string): StoredDocument | undefined {
    return this.documents.get(id);
  }
}
