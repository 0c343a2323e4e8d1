import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../core/errors";
import { Transport } from "../core/transport";
import { Logger, MetricsRegistry } from "../observability";
import { CertificateIdentifier, MediaDownloadResult, MediaReference } from "../types";

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  "image/jpeg": "jpg",
  "image/jpg": "jpg",
  "image/pjpeg": "jpg",
  "image/png": "png",
  "image/gif": "gif",
  "image/webp": "webp",
  "image/avif": "avif",
  "image/bmp": "bmp",
  "image/tiff": "tiff",
  "image/svg+xml": "svg",
  "image/heic": "heic",
  "application/pdf": "pdf",
};

const EXTENSION_PATTERN = /^[a-z0-9]{1,8}$/;

function extensionFromUrl(url: string): string | undefined {
  let segment: string;
  try {
    const pathname = new URL(url).pathname;
    segment = decodeURIComponent(pathname.slice(pathname.lastIndexOf("/") + 1));
  } catch {
    return undefined;
  }
  const ext = path.posix.extname(segment).slice(1).toLowerCase();
  return EXTENSION_PATTERN.test(ext) ? ext : undefined;
}

/** Declared content type first, then the URL's last path segment, then `fallback`. */
export function detectExtension(contentType: string | undefined, url: string, fallback: string): string {
  const mime = contentType?.split(";")[0].trim().toLowerCase();
  const fromType = mime ? CONTENT_TYPE_EXTENSIONS[mime] : undefined;
  return fromType ?? extensionFromUrl(url) ?? fallback;
}

function percentEncode(char: string): string {
  return `%${char.charCodeAt(0).toString(16).toUpperCase().padStart(2, "0")}`;
}

/**
 * Directory name for a certificate. `%`, path separators, reserved and control
 * characters and a leading `.` are percent-encoded, so distinct identifiers never
 * share a directory.
 */
export function certDirName(cert: CertificateIdentifier): string {
  return cert.replace(/[%/\\:*?"<>|\x00-\x1f\x7f]/g, percentEncode).replace(/^\./, percentEncode);
}

export interface MediaStoreDeps {
  transport: Transport;
  rootDir: string;
  defaultExtension: string;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface StoreAllOptions {
  referer?: string;
  signal?: AbortSignal;
}

export class MediaStore {
  private readonly deps: MediaStoreDeps;

  constructor(deps: MediaStoreDeps) {
    this.deps = deps;
  }

  certDir(cert: CertificateIdentifier): string {
    return path.resolve(this.deps.rootDir, certDirName(cert));
  }

  /**
   * Downloads `refs` one at a time, in position order. Each file is named after the
   * reference's position, so a failed download leaves a hole in the sequence instead
   * of shifting the names of the references after it.
   */
  async storeAll(
    cert: CertificateIdentifier,
    refs: readonly MediaReference[],
    options: StoreAllOptions = {},
  ): Promise<MediaDownloadResult[]> {
    const results: MediaDownloadResult[] = [];
    for (const ref of refs) {
      if (options.signal?.aborted) {
        break;
      }
      results.push(await this.storeOne(cert, ref, options));
    }
    return results;
  }

  private async storeOne(
    cert: CertificateIdentifier,
    ref: MediaReference,
    options: StoreAllOptions,
  ): Promise<MediaDownloadResult> {
    const { logger, metrics } = this.deps;
    const stopTimer = metrics.startTimer("download_ms");

    try {
      const response = await this.deps.transport.fetch(
        {
          url: ref.url,
          method: "GET",
          headers: {
            accept: "image/avif,image/webp,image/*,application/pdf,*/*;q=0.8",
            ...(options.referer ? { referer: options.referer } : {}),
          },
        },
        options.signal,
      );
      if (response.body.length === 0) {
        throw new Error("Empty response body");
      }

      const ext = detectExtension(response.contentType, response.url, this.deps.defaultExtension);
      const filePath = await this.write(cert, ref.position, ext, response.body);
      const durationMs = stopTimer();
      metrics.incrementCounter("downloads_ok", 1);
      logger.info("media_stored", { cert, url: ref.url, index: ref.position, path: filePath, durationMs });

      return {
        cert,
        index: ref.position,
        url: ref.url,
        status: "stored",
        stored: {
          cert,
          index: ref.position,
          url: ref.url,
          path: filePath,
          bytes: response.body.length,
          contentType: response.contentType,
        },
      };
    } catch (error) {
      const durationMs = stopTimer();
      const message = errorMessage(error);
      metrics.incrementCounter("downloads_failed", 1);
      logger.warn("media_download_failed", {
        cert,
        url: ref.url,
        index: ref.position,
        operation: "media_download",
        durationMs,
        error: message,
      });
      return { cert, index: ref.position, url: ref.url, status: "failed", error: message };
    }
  }

  private async write(cert: CertificateIdentifier, index: number, ext: string, body: Buffer): Promise<string> {
    const dir = this.certDir(cert);
    await fs.promises.mkdir(dir, { recursive: true });
    const fileName = `image_${index}.${ext}`;
    const finalPath = path.join(dir, fileName);
    const tempPath = `${finalPath}.part`;

    try {
      await fs.promises.writeFile(tempPath, body);
      await fs.promises.rename(tempPath, finalPath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }

    // A previous run may have stored the same index under another extension.
    const stale = (await fs.promises.readdir(dir)).filter(
      (entry) => entry !== fileName && entry.startsWith(`image_${index}.`) && !entry.endsWith(".part"),
    );
    await Promise.all(stale.map((entry) => fs.promises.rm(path.join(dir, entry), { force: true })));

    return finalPath;
  }
}
