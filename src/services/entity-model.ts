import { EntityDecodeError } from "../lib/errors.js";
import { nullObserver, type TopologyObserver } from "../lib/observer.js";
import { isRecord } from "../lib/types.js";

/** Display name of a service that was referenced but never resolved. */
export const UNKNOWN = "UNKNOWN";

export const SERVICE_TYPE = "SERVICE";
const PROCESS_GROUP_TYPE = "PROCESS_GROUP";

export interface ServiceProperties {
  readonly processGroup: string;
  readonly webApplicationId: string;
  readonly remoteEndpoint: string;
  readonly webServerName: string;
  readonly serviceType: string;
}

export interface ServiceNode {
  readonly id: string;
  readonly displayName: string;
  readonly properties: ServiceProperties;
  /** Ids of services this one calls, in API order. */
  readonly outgoingCalls: readonly string[];
  /** Ids of services reported as calling this one (full-scan payloads only). */
  readonly incomingCalls: readonly string[];
}

export const EMPTY_PROPERTIES: ServiceProperties = Object.freeze({
  processGroup: "",
  webApplicationId: "",
  remoteEndpoint: "",
  webServerName: "",
  serviceType: "",
});

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") return String(value);
  if (Array.isArray(value)) return value.map(stringify).filter((item) => item.length > 0).join(", ");
  return "";
}

function relationshipList(relationships: unknown, key: string): unknown[] {
  if (!isRecord(relationships)) return [];
  const list = relationships[key];
  return Array.isArray(list) ? list : [];
}

/** Ids of relationship targets of the given entity type, first occurrence order, no repeats. */
function relatedIds(relationships: unknown, key: string, type: string): string[] {
  const ids: string[] = [];
  const seen = new Set<string>();
  for (const ref of relationshipList(relationships, key)) {
    if (!isRecord(ref) || ref.type !== type) continue;
    const id = typeof ref.id === "string" ? ref.id.trim() : "";
    if (id && !seen.has(id)) {
      seen.add(id);
      ids.push(id);
    }
  }
  return ids;
}

export function decodeServiceNode(raw: unknown): ServiceNode {
  if (!isRecord(raw)) {
    throw new EntityDecodeError("Entity record is not an object");
  }

  const id = typeof raw.entityId === "string" ? raw.entityId.trim() : "";
  if (!id) {
    throw new EntityDecodeError("Entity record has no entityId");
  }

  const displayName = typeof raw.displayName === "string" && raw.displayName.length > 0 ? raw.displayName : UNKNOWN;
  const props = isRecord(raw.properties) ? raw.properties : {};

  return {
    id,
    displayName,
    properties: {
      processGroup: relatedIds(raw.fromRelationships, "runsOn", PROCESS_GROUP_TYPE)[0] ?? "",
      webApplicationId: stringify(props.webApplicationId),
      remoteEndpoint: stringify(props.remoteEndpoint),
      webServerName: stringify(props.webServerName),
      serviceType: stringify(props.serviceType),
    },
    outgoingCalls: relatedIds(raw.fromRelationships, "calls", SERVICE_TYPE),
    incomingCalls: relatedIds(raw.toRelationships, "called_by", SERVICE_TYPE),
  };
}

/**
 * Decodes every record of a batch. A record that fails to decode is reported
 * to the observer and skipped; the rest of the batch survives.
 */
export function decodeBatch(raws: readonly unknown[], observer: TopologyObserver = nullObserver): ServiceNode[] {
  const nodes: ServiceNode[] = [];
  for (const raw of raws) {
    try {
      nodes.push(decodeServiceNode(raw));
    } catch (err) {
      if (!(err instanceof EntityDecodeError)) throw err;
      observer.onLog(`⚠ Skipping malformed entity record: ${err.message}`, "warn");
    }
  }
  return nodes;
}
