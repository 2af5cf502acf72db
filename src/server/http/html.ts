/**
 * HTML Utilities
 *
 * Thin layer over linkedom giving the extractor the small query surface it
 * needs: parse, select, text, attributes and removal.
 */

import { parseHTML } from "linkedom";

/**
 * The element operations the extractor relies on.
 * Both linkedom's elements and the DOM's satisfy this shape.
 */
export interface HtmlElement {
  readonly tagName: string;
  readonly textContent: string | null;
  getAttribute(name: string): string | null;
  hasAttribute(name: string): boolean;
  querySelector(selectors: string): HtmlElement | null;
  querySelectorAll(selectors: string): ArrayLike<HtmlElement>;
  remove(): void;
}

/**
 * A parsed document.
 */
export interface HtmlDocument {
  querySelector(selectors: string): HtmlElement | null;
  querySelectorAll(selectors: string): ArrayLike<HtmlElement>;
}

/**
 * Wraps an HTML fragment in a full document structure.
 *
 * linkedom requires a proper document structure to build a body.
 */
export function wrapHtmlFragment(html: string): string {
  return `<!DOCTYPE html><html><head></head><body>${html}</body></html>`;
}

/**
 * Parses HTML (a full document or a fragment) into a queryable document.
 */
export function parseDocument(html: string): HtmlDocument {
  const trimmedHtml = html.trim().slice(0, 20).toLowerCase();
  const isFullDocument = trimmedHtml.startsWith("<!doctype") || trimmedHtml.startsWith("<html");
  const { document } = parseHTML(isFullDocument ? html : wrapHtmlFragment(html));
  return document;
}

/**
 * Returns all matches of a selector as an array, in document order.
 */
export function selectAll(root: HtmlDocument | HtmlElement, selectors: string): HtmlElement[] {
  return Array.from(root.querySelectorAll(selectors));
}

/**
 * Returns the element's text with whitespace runs collapsed to single spaces.
 */
export function elementText(element: HtmlElement): string {
  return (element.textContent ?? "").replace(/\s+/g, " ").trim();
}

/**
 * Returns the trimmed value of an attribute, or null when missing or blank.
 */
export function attributeValue(element: HtmlElement, name: string): string | null {
  const value = element.getAttribute(name)?.trim();
  return value ? value : null;
}
