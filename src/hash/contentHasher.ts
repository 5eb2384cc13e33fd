import crypto from "node:crypto";
import { CrawlTarget } from "../types";

export function hashContent(bytes: Uint8Array): string {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}

/**
 * Remembers which target first yielded a given document fingerprint, so a
 * later target pointing at byte-identical content is not extracted again.
 */
export class DuplicateDocumentRegistry {
  private readonly owners = new Map<string, string>();

  seed(targets: readonly CrawlTarget[]): void {
    for (const target of targets) {
      if (target.status === "processed" && target.contentHash) {
        this.register(target.contentHash, target.id);
      }
    }
  }

  firstSeenBy(hash: string, exceptTargetId?: string): string | undefined {
    const owner = this.owners.get(hash);
    return owner === exceptTargetId ? undefined : owner;
  }

  register(hash: string, targetId: string): void {
    if (!this.owners.has(hash)) {
      this.owners.set(hash, targetId);
    }
  }

  get size(): number {
    return this.owners.size;
  }
}
