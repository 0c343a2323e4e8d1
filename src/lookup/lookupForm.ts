import { load } from "cheerio";
import { FormNotFound } from "../core/errors";
import { HttpMethod, TransportRequest } from "../core/transport";

export interface LookupFormSelectors {
  lookupInput: string;
  submitButtonName: string;
}

export interface LookupForm {
  /** Landing page the form was found on; sent as the referer of every lookup. */
  pageUrl: string;
  action: string;
  method: HttpMethod;
  fieldName: string;
  /** Hidden, pre-filled and selected fields submitted alongside the identifier, in document order. */
  defaultFields: ReadonlyArray<readonly [string, string]>;
  submitter?: readonly [string, string];
}

export interface LookupRequest extends TransportRequest {
  cert: string;
  url: string;
  method: HttpMethod;
}

const TEXT_INPUT_TYPES = new Set(["", "text", "tel", "search", "number"]);
const SKIPPED_INPUT_TYPES = new Set(["submit", "button", "image", "reset", "file"]);

/**
 * Finds the certificate lookup form on the landing page: the first form holding an
 * element matching `selectors.lookupInput`.
 */
export function locateLookupForm(html: string, pageUrl: string, selectors: LookupFormSelectors): LookupForm {
  const $ = load(html);
  const form = $("form")
    .filter((_, element) => $(element).find(selectors.lookupInput).length > 0)
    .first();

  if (form.length === 0) {
    throw new FormNotFound(pageUrl, `no form contains ${selectors.lookupInput}`);
  }

  const lookupInput = form.find(selectors.lookupInput).first();
  let fieldName = lookupInput.attr("name")?.trim();
  if (!fieldName) {
    const fallback = form
      .find("input[name]")
      .filter((_, element) => TEXT_INPUT_TYPES.has(($(element).attr("type") ?? "").toLowerCase()))
      .first();
    fieldName = fallback.attr("name")?.trim();
  }
  if (!fieldName) {
    throw new FormNotFound(pageUrl, `${selectors.lookupInput} has no usable field name`);
  }

  const defaultFields: Array<[string, string]> = [];
  form.find("input[name], select[name], textarea[name]").each((_, element) => {
    const field = $(element);
    const name = field.attr("name") ?? "";
    if (!name || name === fieldName || field.attr("disabled") !== undefined) {
      return;
    }

    if (element.tagName === "textarea") {
      defaultFields.push([name, field.text()]);
      return;
    }

    if (element.tagName === "select") {
      const options = field.find("option");
      const selected = options.filter((_, option) => $(option).attr("selected") !== undefined);
      // Without a selection a single-choice list submits its first option.
      const chosen = selected.length > 0 ? selected : field.attr("multiple") === undefined ? options.first() : selected;
      chosen.each((_, option) => {
        const choice = $(option);
        defaultFields.push([name, choice.attr("value") ?? choice.text().trim()]);
      });
      return;
    }

    const type = (field.attr("type") ?? "").toLowerCase();
    if (SKIPPED_INPUT_TYPES.has(type)) {
      return;
    }
    if ((type === "checkbox" || type === "radio") && field.attr("checked") === undefined) {
      return;
    }
    defaultFields.push([name, field.attr("value") ?? ""]);
  });

  const button = form
    .find("button[name], input[type='submit'][name]")
    .filter((_, element) => $(element).attr("name") === selectors.submitButtonName)
    .first();
  const submitter: [string, string] | undefined =
    button.length > 0 ? [selectors.submitButtonName, button.attr("value") ?? ""] : undefined;

  const rawAction = form.attr("action")?.trim();
  const method = (form.attr("method") ?? "POST").trim().toUpperCase() === "GET" ? "GET" : "POST";

  return Object.freeze({
    pageUrl,
    action: rawAction ? new URL(rawAction, pageUrl).toString() : pageUrl,
    method,
    fieldName,
    defaultFields: Object.freeze(defaultFields),
    submitter,
  });
}

export function buildLookupRequest(form: LookupForm, cert: string): LookupRequest {
  const params = new URLSearchParams();
  for (const [name, value] of form.defaultFields) {
    params.append(name, value);
  }
  params.append(form.fieldName, cert);
  if (form.submitter) {
    params.append(form.submitter[0], form.submitter[1]);
  }

  if (form.method === "GET") {
    const url = new URL(form.action);
    url.search = params.toString();
    return { cert, url: url.toString(), method: "GET", headers: { referer: form.pageUrl } };
  }

  return {
    cert,
    url: form.action,
    method: "POST",
    headers: {
      "content-type": "application/x-www-form-urlencoded",
      referer: form.pageUrl,
    },
    body: params.toString(),
  };
}
