/**
 * Digest type definitions
 */

export type DigestType = "daily" | "weekly";

/**
 * Minimal announcement view needed to render a digest entry.
 */
export type DigestEntry = {
  company_name: string;
  funding_stage: string;
  funding_amount: string;
  location: string;
  industry: string;
  description: string;
  url: string;
};

export type RenderedDigest = {
  digestType: DigestType;
  subject: string;
  body: string;
  /** Number of announcements in the digest */
  count: number;
};
