import type { FieldInfo, SignalType } from "@tailscope/contracts";

export interface DisplayField {
  /** Document path, or a virtual column such as `_resource` or `_metrics`. */
  name: string;
  label: string;
  /** 0 takes the remaining width. */
  width: number;
  selected: boolean;
  /** null: not searchable. Empty: search `name` itself. */
  searchFields: string[] | null;
}

const LOG_FIELDS: DisplayField[] = [
  { name: "@timestamp", label: "TIME", width: 8, selected: true, searchFields: null },
  { name: "severity_text", label: "LEVEL", width: 7, selected: true, searchFields: ["severity_text", "log.level"] },
  {
    name: "_resource",
    label: "RESOURCE",
    width: 12,
    selected: true,
    searchFields: ["resource.attributes.service.namespace", "resource.attributes.deployment.environment"],
  },
  {
    name: "service.name",
    label: "SERVICE",
    width: 15,
    selected: true,
    searchFields: ["resource.attributes.service.name", "service.name"],
  },
  { name: "body.text", label: "MESSAGE", width: 0, selected: true, searchFields: ["body.text", "message", "event_name"] },
];

const TRACE_FIELDS: DisplayField[] = [
  { name: "@timestamp", label: "TIME", width: 8, selected: true, searchFields: null },
  {
    name: "service.name",
    label: "SERVICE",
    width: 15,
    selected: true,
    searchFields: ["resource.attributes.service.name", "service.name"],
  },
  { name: "name", label: "NAME", width: 25, selected: true, searchFields: ["name"] },
  { name: "duration_ms", label: "DUR(ms)", width: 9, selected: true, searchFields: null },
  { name: "status.code", label: "STATUS", width: 6, selected: true, searchFields: ["status.code"] },
  { name: "kind", label: "KIND", width: 8, selected: true, searchFields: ["kind"] },
  { name: "trace_id", label: "TRACE", width: 0, selected: true, searchFields: ["trace_id"] },
];

const METRIC_FIELDS: DisplayField[] = [
  { name: "@timestamp", label: "TIME", width: 8, selected: true, searchFields: null },
  {
    name: "service.name",
    label: "SERVICE",
    width: 15,
    selected: true,
    searchFields: ["resource.attributes.service.name", "service.name", "attributes.service.name"],
  },
  { name: "scope.name", label: "SCOPE", width: 20, selected: true, searchFields: ["scope.name"] },
  { name: "attributes.span.name", label: "SPAN", width: 25, selected: true, searchFields: ["attributes.span.name"] },
  { name: "_metrics", label: "METRICS", width: 0, selected: true, searchFields: null },
];

function cloneFields(fields: DisplayField[]): DisplayField[] {
  return fields.map((field) => ({
    ...field,
    searchFields: field.searchFields ? [...field.searchFields] : null,
  }));
}

export function defaultFields(signal: SignalType): DisplayField[] {
  switch (signal) {
    case "traces":
      return cloneFields(TRACE_FIELDS);
    case "metrics":
      return cloneFields(METRIC_FIELDS);
    default:
      return cloneFields(LOG_FIELDS);
  }
}

export function fieldSearchFields(field: DisplayField): string[] {
  if (field.searchFields === null) return [];
  return field.searchFields.length > 0 ? field.searchFields : [field.name];
}

/** Unique search targets across all display fields, in first-seen order. */
export function collectSearchFields(fields: DisplayField[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const field of fields) {
    for (const name of fieldSearchFields(field)) {
      if (seen.has(name)) continue;
      seen.add(name);
      out.push(name);
    }
  }
  return out;
}

function labelFor(fieldName: string): string {
  const lastDot = fieldName.lastIndexOf(".");
  const tail = lastDot >= 0 ? fieldName.slice(lastDot + 1) : fieldName;
  return tail.toUpperCase().slice(0, 12);
}

/** Removes the field when it is displayed, otherwise appends it as a new column. */
export function toggleField(fields: DisplayField[], fieldName: string): DisplayField[] {
  if (fields.some((field) => field.name === fieldName)) {
    return fields.filter((field) => field.name !== fieldName);
  }
  const searchable = !fieldName.includes("timestamp") && !fieldName.includes("time");
  return [
    ...fields,
    {
      name: fieldName,
      label: labelFor(fieldName),
      width: 15,
      selected: true,
      searchFields: searchable ? [] : null,
    },
  ];
}

function matchesFilter(name: string, filter: string): boolean {
  return !filter || name.toLowerCase().includes(filter.toLowerCase());
}

/**
 * Field picker order: displayed fields first in column order, then every other known field by
 * document count, most populated first.
 */
export function sortedFieldList(displayFields: DisplayField[], available: FieldInfo[], filter = ""): FieldInfo[] {
  const byName = new Map(available.map((field) => [field.name, field]));
  const displayed = new Set(displayFields.map((field) => field.name));

  const out: FieldInfo[] = [];
  for (const field of displayFields) {
    if (!matchesFilter(field.name, filter)) continue;
    const known = byName.get(field.name);
    if (known) {
      out.push(known);
      continue;
    }
    let docCount = 0;
    for (const name of field.searchFields ?? []) {
      docCount = Math.max(docCount, byName.get(name)?.docCount ?? 0);
    }
    out.push({
      name: field.name,
      type: "display",
      searchable: fieldSearchFields(field).length > 0,
      aggregatable: false,
      docCount,
    });
  }

  const rest = available
    .filter((field) => !displayed.has(field.name) && matchesFilter(field.name, filter))
    .sort((a, b) => b.docCount - a.docCount || a.name.localeCompare(b.name));
  return [...out, ...rest];
}
