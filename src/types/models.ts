export type CertificateIdentifier = string;

export interface MediaReference {
  url: string;
  /** 1-based order of first appearance on the detail page. */
  position: number;
}

export interface StoredMedia {
  cert: CertificateIdentifier;
  index: number;
  url: string;
  path: string;
  bytes: number;
  contentType?: string;
}

export type MediaDownloadStatus = "stored" | "failed" | "skipped";

export interface MediaDownloadResult {
  cert: CertificateIdentifier;
  index: number;
  url: string;
  status: MediaDownloadStatus;
  stored?: StoredMedia;
  error?: string;
}

export interface ResultRecord {
  readonly cert: CertificateIdentifier;
  readonly refs: readonly string[];
}

export type CertState = "pending" | "requested" | "parsed" | "resolved" | "emitted";

export interface CertOutcome {
  /** 0-based position of the certificate in the input. */
  position: number;
  record: ResultRecord;
  /** Last state reached before emission. */
  finalState: Exclude<CertState, "emitted" | "pending">;
  detailPageUrl?: string;
  downloads: MediaDownloadResult[];
  lookupError?: string;
}
