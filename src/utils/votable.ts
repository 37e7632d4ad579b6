import { XMLParser } from "fast-xml-parser";

const ARRAY_TAGS = new Set([
  "RESOURCE",
  "TABLE",
  "FIELD",
  "PARAM",
  "TR",
  "TD",
  "INFO",
  "result",
]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (tagName) => ARRAY_TAGS.has(tagName),
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function children(node: XmlNode, tag: string): XmlNode[] {
  const raw = node[tag];
  if (Array.isArray(raw)) return raw.filter(isNode);
  return isNode(raw) ? [raw] : [];
}

function child(node: XmlNode, tag: string): XmlNode | undefined {
  return children(node, tag)[0];
}

function attr(node: XmlNode, name: string): string | undefined {
  const value = node[`@_${name}`];
  return typeof value === "string" ? value : undefined;
}

/** Text content of a leaf, whether the parser produced a string or a node. */
function text(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (isNode(value)) {
    const inner = value["#text"];
    return typeof inner === "string" ? inner : "";
  }
  return "";
}

function parseRoot(xml: string, rootTag: string): XmlNode {
  const doc: unknown = parser.parse(xml);
  const root = isNode(doc) ? doc[rootTag] : undefined;
  if (!isNode(root)) {
    throw new Error(`Expected a <${rootTag}> document`);
  }
  return root;
}

export type VotableRow = Record<string, string>;

export interface VotableResource {
  type?: string;
  id?: string;
  params: Record<string, string>;
  rows: VotableRow[];
}

/**
 * Reads every RESOURCE of a VOTable serialised as TABLEDATA. Cell values stay
 * strings; callers convert the columns they care about.
 */
export function parseVotable(xml: string): VotableResource[] {
  const root = parseRoot(xml, "VOTABLE");

  const errorInfo = children(root, "RESOURCE")
    .flatMap((resource) => children(resource, "INFO"))
    .find(
      (info) =>
        attr(info, "name") === "QUERY_STATUS" && attr(info, "value") === "ERROR",
    );
  if (errorInfo) {
    throw new Error(`Query failed: ${text(errorInfo) || "unknown error"}`);
  }

  return children(root, "RESOURCE").map((resource) => {
    const params: Record<string, string> = {};
    for (const param of children(resource, "PARAM")) {
      const name = attr(param, "name");
      if (name) params[name] = attr(param, "value") ?? "";
    }

    const rows: VotableRow[] = [];
    for (const table of children(resource, "TABLE")) {
      const fields = children(table, "FIELD").map(
        (field) => attr(field, "name") ?? "",
      );
      const data = child(table, "DATA") ?? {};
      if (child(data, "BINARY") || child(data, "BINARY2") || child(data, "FITS")) {
        throw new Error("Only TABLEDATA serialisation is supported");
      }
      const tabledata = child(data, "TABLEDATA");
      for (const tr of tabledata ? children(tabledata, "TR") : []) {
        const cells: unknown[] = Array.isArray(tr.TD) ? tr.TD : [];
        const row: VotableRow = {};
        fields.forEach((field, i) => {
          row[field] = text(cells[i]);
        });
        rows.push(row);
      }
    }

    return {
      type: attr(resource, "type"),
      id: attr(resource, "ID"),
      params,
      rows,
    };
  });
}

export interface UwsResult {
  id: string;
  href: string;
  size?: number;
}

export interface UwsJob {
  jobId: string;
  phase: string;
  results: UwsResult[];
  errorSummary?: string;
}

/** Reads a UWS 1.x job document. */
export function parseUwsJob(xml: string): UwsJob {
  const root = parseRoot(xml, "job");

  const results = children(child(root, "results") ?? {}, "result").map(
    (result) => {
      const size = Number(attr(result, "size"));
      return {
        id: attr(result, "id") ?? "",
        href: attr(result, "href") ?? "",
        size: Number.isFinite(size) && size > 0 ? size : undefined,
      };
    },
  );

  const summary = child(root, "errorSummary");

  return {
    jobId: text(root.jobId),
    phase: text(root.phase).trim().toUpperCase(),
    results: results.filter((r) => r.href),
    errorSummary: summary ? text(summary.message) || undefined : undefined,
  };
}
