/**
 * File digest sink — writes each rendered digest to its own text file
 *
 * File name: <type>_digest_<timestamp>.txt, subject on the first line.
 */

import { mkdir, writeFile } from "fs/promises";
import * as path from "path";
import type { RenderedDigest } from "@/types";
import type { DigestSink } from "@/interfaces/digestSink";
import * as logger from "@/logger";

/**
 * Filesystem-safe timestamp: 2026-01-02T03:04:05.678Z → 2026-01-02_03-04-05
 */
export function formatFileTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", "_").replace(/:/g, "-");
}

export class FileDigestSink implements DigestSink {
  readonly name = "file";

  constructor(
    private readonly outputDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async deliver(digest: RenderedDigest): Promise<void> {
    const dir = path.resolve(process.cwd(), this.outputDir);
    const filePath = path.join(
      dir,
      `${digest.digestType}_digest_${formatFileTimestamp(this.now())}.txt`,
    );

    await mkdir(dir, { recursive: true });
    await writeFile(filePath, `${digest.subject}\n\n${digest.body}\n`, "utf-8");

    logger.info("Digest written", { path: filePath, count: digest.count });
  }
}
