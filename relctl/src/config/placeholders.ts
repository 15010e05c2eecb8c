/**
 * `{field}` placeholder resolution over a parsed config tree.
 *
 * A placeholder is looked up in the mapping that holds the string first, then
 * in each enclosing mapping up to the root, so `tag: "{name}-{release}"` inside
 * a project reads the project's own `name` and the top-level `release`.
 * Paths may descend with dots or brackets: `{projects.0.name}`,
 * `{projects[0][name]}`. `{{` and `}}` stand for literal braces.
 *
 * A string with any placeholder that cannot be resolved is kept verbatim.
 */

type Container = Record<string, unknown> | unknown[];

type Lookup = { value: unknown; scopes: Container[] };

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isContainer(value: unknown): value is Container {
  return typeof value === "object" && value !== null;
}

/** Split `a.b[0][c]` into `["a", "b", "0", "c"]`; null when malformed. */
export function parseFieldPath(expr: string): string[] | null {
  const segments: string[] = [];
  const re = /([^.[\]]+)|\[([^\]]*)\]|\./y;
  let expectSegment = true;
  let pos = 0;
  while (pos < expr.length) {
    re.lastIndex = pos;
    const m = re.exec(expr);
    if (!m) return null;
    if (m[1] !== undefined) {
      if (!expectSegment) return null;
      segments.push(m[1]);
      expectSegment = false;
    } else if (m[2] !== undefined) {
      if (segments.length === 0 || m[2].length === 0) return null;
      segments.push(m[2]);
      expectSegment = false;
    } else {
      if (expectSegment) return null;
      expectSegment = true;
    }
    pos = re.lastIndex;
  }
  return segments.length > 0 && !expectSegment ? segments : null;
}

function child(container: unknown, key: string): { found: boolean; value: unknown } {
  if (Array.isArray(container)) {
    if (!/^\d+$/.test(key)) return { found: false, value: undefined };
    const idx = Number(key);
    return idx < container.length ? { found: true, value: container[idx] } : { found: false, value: undefined };
  }
  if (isMapping(container) && Object.prototype.hasOwnProperty.call(container, key)) {
    return { found: true, value: container[key] };
  }
  return { found: false, value: undefined };
}

function lookup(segments: string[], scopes: Container[]): Lookup | null {
  for (let i = 0; i < scopes.length; i++) {
    const scope = scopes[i];
    if (!isMapping(scope)) continue;
    let current = child(scope, segments[0]);
    if (!current.found) continue;

    let chain = scopes.slice(i);
    let holder: unknown = scope;
    for (const segment of segments.slice(1)) {
      if (!isContainer(current.value)) return null;
      holder = current.value;
      chain = [current.value, ...chain];
      current = child(holder, segment);
      if (!current.found) return null;
    }
    return { value: current.value, scopes: chain };
  }
  return null;
}

function scalarText(value: unknown, scopes: Container[], inProgress: Set<string>): string | null {
  if (typeof value === "string") return resolveString(value, scopes, inProgress);
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

function resolveString(template: string, scopes: Container[], inProgress: Set<string>): string | null {
  if (!template.includes("{") && !template.includes("}")) return template;
  if (inProgress.has(template)) return null;
  inProgress.add(template);

  try {
    let out = "";
    let i = 0;
    while (i < template.length) {
      const ch = template[i];
      if (ch === "{" && template[i + 1] === "{") {
        out += "{";
        i += 2;
      } else if (ch === "}" && template[i + 1] === "}") {
        out += "}";
        i += 2;
      } else if (ch === "}") {
        return null;
      } else if (ch === "{") {
        const end = template.indexOf("}", i + 1);
        if (end === -1) return null;
        const segments = parseFieldPath(template.slice(i + 1, end));
        if (!segments) return null;
        const found = lookup(segments, scopes);
        if (!found) return null;
        const text = scalarText(found.value, found.scopes, inProgress);
        if (text === null) return null;
        out += text;
        i = end + 1;
      } else {
        out += ch;
        i += 1;
      }
    }
    return out;
  } finally {
    inProgress.delete(template);
  }
}

function walk(node: unknown, scopes: Container[]): unknown {
  if (Array.isArray(node)) {
    const inner = [node, ...scopes];
    return node.map((item) => walk(item, inner));
  }
  if (isMapping(node)) {
    const inner = [node, ...scopes];
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(node)) {
      out[key] = walk(value, inner);
    }
    return out;
  }
  if (typeof node === "string") {
    return resolveString(node, scopes, new Set()) ?? node;
  }
  return node;
}

/**
 * Return a copy of `root` with every string's placeholders substituted.
 * Non-string scalars pass through unchanged; the input is not modified.
 */
export function resolvePlaceholders(root: unknown): unknown {
  return walk(root, []);
}
