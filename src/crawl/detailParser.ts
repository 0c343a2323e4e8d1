import { load } from "cheerio";
import { MediaReference } from "../types";

function resolveDocumentBase(baseHref: string | undefined, pageUrl: string): string {
  if (!baseHref) {
    return pageUrl;
  }
  try {
    return new URL(baseHref.trim(), pageUrl).toString();
  } catch {
    return pageUrl;
  }
}

function normalizeUrl(raw: string | undefined, baseUrl: string): string | undefined {
  const value = raw?.trim();
  if (!value || value.startsWith("#") || /^javascript:/i.test(value)) {
    return undefined;
  }
  try {
    return new URL(value, baseUrl).toString();
  } catch {
    return undefined;
  }
}

/**
 * Collects the certificate's media URLs from every `containerSelector` element, in
 * document order. An anchor's `href` wins over the `src` of images nested in it
 * (the link points at the full-size asset, the image is usually a thumbnail).
 */
export function extractMediaReferences(html: string, pageUrl: string, containerSelector: string): MediaReference[] {
  const $ = load(html);
  const baseUrl = resolveDocumentBase($("base[href]").first().attr("href"), pageUrl);
  const references: MediaReference[] = [];
  const seen = new Set<string>();

  const add = (url: string | undefined): void => {
    if (!url || seen.has(url)) {
      return;
    }
    seen.add(url);
    references.push({ url, position: references.length + 1 });
  };

  $(containerSelector).each((_, container) => {
    $(container)
      .find("a[href], img[src]")
      .each((_, element) => {
        const node = $(element);
        if (node.is("a")) {
          add(normalizeUrl(node.attr("href"), baseUrl));
          return;
        }
        const anchor = node.closest("a[href]");
        if (anchor.length > 0 && $.contains(container, anchor[0]) && normalizeUrl(anchor.attr("href"), baseUrl)) {
          return;
        }
        add(normalizeUrl(node.attr("src"), baseUrl));
      });
  });

  return references;
}
