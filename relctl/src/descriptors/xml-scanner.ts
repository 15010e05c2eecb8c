import { XMLValidator } from "fast-xml-parser";
import { DescriptorError } from "../types/errors.js";

const XML_NS = "http://www.w3.org/XML/1998/namespace";

/**
 * Element located in the source text. Offsets point into the original
 * string so edits can splice new text in without re-serializing the document.
 */
export type XmlElement = {
  index: number;
  name: string;
  localName: string;
  namespace: string | null;
  parent: number;
  /** Offset just past the start tag's `>`. */
  contentStart: number;
  /** Offset of the end tag's `<`; equals contentStart for `<x/>`. */
  contentEnd: number;
  /** Offset of `/` in a self-closing tag, -1 otherwise. */
  selfCloseAt: number;
  /** Child elements, comments, CDATA or processing instructions in the content. */
  hasMarkup: boolean;
};

export type TextEdit = { start: number; end: number; replacement: string };

type NsScope = Map<string, string | null>;

type OpenElement = { el: XmlElement; outerScope: NsScope };

function malformed(reason: string, offset: number, source?: string): DescriptorError {
  return new DescriptorError(`Malformed XML (${reason}) at offset ${offset}`, source);
}

const NAME_RE = /[^\s/>=]+/y;

function readStartTag(
  text: string,
  lt: number,
  source?: string,
): { name: string; attrs: Array<[string, string]>; end: number; selfCloseAt: number } {
  NAME_RE.lastIndex = lt + 1;
  const nameMatch = NAME_RE.exec(text);
  if (!nameMatch) throw malformed("missing element name", lt, source);
  const name = nameMatch[0];
  const attrs: Array<[string, string]> = [];
  let i = NAME_RE.lastIndex;

  while (i < text.length) {
    while (/\s/.test(text[i] ?? "")) i++;
    const ch = text[i];
    if (ch === ">") return { name, attrs, end: i + 1, selfCloseAt: -1 };
    if (ch === "/" && text[i + 1] === ">") return { name, attrs, end: i + 2, selfCloseAt: i };

    NAME_RE.lastIndex = i;
    const attrMatch = NAME_RE.exec(text);
    if (!attrMatch) throw malformed(`bad attribute in <${name}>`, i, source);
    i = NAME_RE.lastIndex;
    while (/\s/.test(text[i] ?? "")) i++;
    if (text[i] !== "=") throw malformed(`attribute without value in <${name}>`, i, source);
    i++;
    while (/\s/.test(text[i] ?? "")) i++;
    const quote = text[i];
    if (quote !== '"' && quote !== "'") throw malformed(`unquoted attribute in <${name}>`, i, source);
    const close = text.indexOf(quote, i + 1);
    if (close === -1) throw malformed(`unterminated attribute in <${name}>`, i, source);
    attrs.push([attrMatch[0], decodeXmlText(text.slice(i + 1, close))]);
    i = close + 1;
  }
  throw malformed(`unterminated start tag <${name}>`, lt, source);
}

function skipDoctype(text: string, lt: number, source?: string): number {
  let depth = 0;
  for (let i = lt + 2; i < text.length; i++) {
    const ch = text[i];
    if (ch === "[") depth++;
    else if (ch === "]") depth--;
    else if (ch === ">" && depth === 0) return i + 1;
  }
  throw malformed("unterminated declaration", lt, source);
}

function splitName(name: string): { prefix: string; local: string } {
  const colon = name.indexOf(":");
  return colon === -1 ? { prefix: "", local: name } : { prefix: name.slice(0, colon), local: name.slice(colon + 1) };
}

/** Check well-formedness with fast-xml-parser; throws DescriptorError otherwise. */
export function assertWellFormed(text: string, source?: string): void {
  const result = XMLValidator.validate(text);
  if (result !== true) {
    const where = source ? ` in ${source}` : "";
    throw new DescriptorError(`Invalid XML${where}: ${result.err.msg} (line ${result.err.line})`, source);
  }
}

/**
 * Locate every element of an XML document, in document order, with
 * namespace URIs resolved from the `xmlns` declarations in scope.
 */
export function scanXml(text: string, source?: string): XmlElement[] {
  const elements: XmlElement[] = [];
  const stack: OpenElement[] = [];
  let scope: NsScope = new Map<string, string | null>([["xml", XML_NS]]);

  const markParent = (): void => {
    const top = stack[stack.length - 1];
    if (top) top.el.hasMarkup = true;
  };

  let i = 0;
  while (i < text.length) {
    const lt = text.indexOf("<", i);
    if (lt === -1) break;

    if (text.startsWith("<!--", lt)) {
      const end = text.indexOf("-->", lt + 4);
      if (end === -1) throw malformed("unterminated comment", lt, source);
      markParent();
      i = end + 3;
    } else if (text.startsWith("<![CDATA[", lt)) {
      const end = text.indexOf("]]>", lt + 9);
      if (end === -1) throw malformed("unterminated CDATA section", lt, source);
      markParent();
      i = end + 3;
    } else if (text.startsWith("<?", lt)) {
      const end = text.indexOf("?>", lt + 2);
      if (end === -1) throw malformed("unterminated processing instruction", lt, source);
      markParent();
      i = end + 2;
    } else if (text.startsWith("<!", lt)) {
      i = skipDoctype(text, lt, source);
    } else if (text.startsWith("</", lt)) {
      const end = text.indexOf(">", lt);
      if (end === -1) throw malformed("unterminated end tag", lt, source);
      const name = text.slice(lt + 2, end).trim();
      const open = stack.pop();
      if (!open || open.el.name !== name) throw malformed(`unexpected </${name}>`, lt, source);
      open.el.contentEnd = lt;
      scope = open.outerScope;
      i = end + 1;
    } else {
      const tag = readStartTag(text, lt, source);
      const outerScope = scope;
      const declarations = tag.attrs.filter(([attr]) => attr === "xmlns" || attr.startsWith("xmlns:"));
      if (declarations.length > 0) {
        scope = new Map(scope);
        for (const [attr, value] of declarations) {
          const prefix = attr === "xmlns" ? "" : attr.slice(6);
          scope.set(prefix, value === "" ? null : value);
        }
      }

      const { prefix, local } = splitName(tag.name);
      const namespace = scope.get(prefix);
      if (namespace === undefined && prefix !== "") {
        throw malformed(`undeclared namespace prefix '${prefix}'`, lt, source);
      }

      markParent();
      const parent = stack[stack.length - 1];
      const el: XmlElement = {
        index: elements.length,
        name: tag.name,
        localName: local,
        namespace: namespace ?? null,
        parent: parent ? parent.el.index : -1,
        contentStart: tag.end,
        contentEnd: tag.end,
        selfCloseAt: tag.selfCloseAt,
        hasMarkup: false,
      };
      elements.push(el);

      if (tag.selfCloseAt === -1) {
        stack.push({ el, outerScope });
      } else {
        scope = outerScope;
      }
      i = tag.end;
    }
  }

  if (stack.length > 0) {
    const open = stack[stack.length - 1];
    throw malformed(`unclosed <${open.el.name}>`, open.el.contentStart, source);
  }
  return elements;
}

export function decodeXmlText(s: string): string {
  return s.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|amp|lt|gt|quot|apos);/g, (match, ref: string) => {
    if (ref.startsWith("#x")) return String.fromCodePoint(parseInt(ref.slice(2), 16));
    if (ref.startsWith("#")) return String.fromCodePoint(parseInt(ref.slice(1), 10));
    const named: Record<string, string> = { amp: "&", lt: "<", gt: ">", quot: '"', apos: "'" };
    return named[ref] ?? match;
  });
}

export function escapeXmlText(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/** Text content of a leaf element, trimmed; null when it holds markup. */
export function elementText(text: string, el: XmlElement): string | null {
  if (el.hasMarkup) return null;
  return decodeXmlText(text.slice(el.contentStart, el.contentEnd)).trim();
}

/**
 * Edit that sets a leaf element's text. Whitespace around the old value is
 * kept; `<version/>` becomes `<version>value</version>`.
 */
export function setElementText(text: string, el: XmlElement, value: string): TextEdit {
  const escaped = escapeXmlText(value);
  if (el.selfCloseAt !== -1) {
    return { start: el.selfCloseAt, end: el.contentStart, replacement: `>${escaped}</${el.name}>` };
  }
  const raw = text.slice(el.contentStart, el.contentEnd);
  const lead = /^\s*/.exec(raw)?.[0].length ?? 0;
  const trail = /\s*$/.exec(raw.slice(lead))?.[0].length ?? 0;
  return { start: el.contentStart + lead, end: el.contentEnd - trail, replacement: escaped };
}

export function applyEdits(text: string, edits: TextEdit[]): string {
  const ordered = [...edits].sort((a, b) => b.start - a.start);
  let out = text;
  for (const edit of ordered) {
    out = out.slice(0, edit.start) + edit.replacement + out.slice(edit.end);
  }
  return out;
}
