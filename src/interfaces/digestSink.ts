/**
 * DigestSink interface — contract for digest delivery
 *
 * The monitor only marks announcements as digested after deliver()
 * resolves. A rejected delivery leaves them pending for the next run.
 */

import type { RenderedDigest } from "@/types";

export interface DigestSink {
  readonly name: string;

  deliver(digest: RenderedDigest): Promise<void>;
}
