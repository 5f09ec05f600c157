import * as k8s from '@kubernetes/client-node';
import { z } from 'zod';
import { MalformedStatsError } from '../ErrorHandling.js';
import { parseCount, parseFraction, parseMemory } from '../utils/QuantityParser.js';
import {
  JsonObject,
  JsonValue,
  Tree,
  add,
  foldAll,
  isJsonObject,
} from '../utils/StructuralMerge.js';
import { Metadata, byName } from './Metadata.js';

export type NodeResourceAmounts = {
  cpu: number;
  memory: number;
  pods: number;
};

export type NodeResourceView = {
  capacity: NodeResourceAmounts;
  allocatable: NodeResourceAmounts;
};

/**
 * Latest kubelet sample as reported, with the sample time in epoch seconds
 */
export type StatsSnapshot = JsonObject & { timestamp: number };

/**
 * Numeric statistics summed over all nodes; the timestamp is their mean
 */
export type ClusterStats = Tree<number> & { timestamp: number };

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

// The kubelet answers /stats with the samples of the last two minutes at 10s intervals
const KubeletStatsSchema = z.object({
  stats: z.array(z.object({ timestamp: z.string() }).catchall(JsonValueSchema)),
});

/**
 * Convert an RFC 3339 timestamp (nanosecond precision allowed) to epoch seconds.
 * Fractional seconds are dropped.
 */
export function parseStatsTimestamp(timestamp: string): number {
  const millis = Date.parse(timestamp.replace(/\.\d+/, ''));
  if (Number.isNaN(millis)) {
    throw new MalformedStatsError(`Unparseable statistics timestamp: '${timestamp}'`);
  }
  return Math.floor(millis / 1000);
}

/**
 * Keep the numeric leaves of a sample, recursing into objects. Only these
 * can be summed over the cluster.
 */
export function toNumericTree(value: JsonObject): Tree<number> {
  const tree: Tree<number> = {};
  for (const [key, member] of Object.entries(value)) {
    if (typeof member === 'number') {
      tree[key] = member;
    } else if (isJsonObject(member)) {
      tree[key] = toNumericTree(member);
    }
  }
  return tree;
}

/**
 * Reduce a raw kubelet statistics reply to its most recent sample. Only the
 * timestamp is converted; every other member is kept as reported.
 */
export function parseNodeStats(raw: unknown, nodeName: string = '<unnamed>'): StatsSnapshot {
  let decoded: unknown = raw;
  if (typeof raw === 'string') {
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      throw new MalformedStatsError(
        `Statistics of node ${nodeName} are not JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  const parsed = KubeletStatsSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new MalformedStatsError(
      `Statistics of node ${nodeName} are malformed: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
    );
  }

  const samples = parsed.data.stats;
  const latest = samples[samples.length - 1];
  if (!latest) {
    throw new MalformedStatsError(`Node ${nodeName} reported no statistics samples`);
  }

  return { ...latest, timestamp: parseStatsTimestamp(latest.timestamp) };
}

export class Node extends Metadata {
  public readonly stats: StatsSnapshot;
  private readonly status?: k8s.V1NodeStatus;

  constructor(node: k8s.V1Node, stats: unknown) {
    super(node.metadata);
    this.status = node.status;
    this.stats = parseNodeStats(stats, this.name);
  }

  public static zeroResources(): NodeResourceView {
    return {
      capacity: { cpu: 0.0, memory: 0.0, pods: 0 },
      allocatable: { cpu: 0.0, memory: 0.0, pods: 0 },
    };
  }

  /**
   * Condition type → status, or undefined when the node reports none
   */
  public get conditions(): Record<string, string> | undefined {
    const conditions = this.status?.conditions;
    if (!conditions || conditions.length === 0) {
      return undefined;
    }
    return Object.fromEntries(conditions.map((c) => [c.type, c.status]));
  }

  public get resources(): NodeResourceView {
    const view = Node.zeroResources();
    if (!this.status) {
      return view;
    }
    const { capacity, allocatable } = this.status;
    if (capacity) {
      addAmounts(view.capacity, capacity);
    }
    if (allocatable) {
      addAmounts(view.allocatable, allocatable);
    }
    return view;
  }
}

function addAmounts(target: NodeResourceAmounts, source: Record<string, string>): void {
  target.cpu += parseFraction(source.cpu ?? '0.0');
  target.memory += parseMemory(source.memory ?? '0.0');
  target.pods += parseCount(source.pods ?? '0');
}

export class NodeList {
  constructor(public readonly items: readonly Node[]) {}

  public get length(): number {
    return this.items.length;
  }

  public listNodes(): { nodes: string[] } {
    return { nodes: this.items.flatMap((node) => (node.name ? [node.name] : [])) };
  }

  public conditions(): Map<string, Record<string, string>> {
    const result = new Map<string, Record<string, string>>();
    for (const node of this.items) {
      const conditions = node.conditions;
      if (node.name && conditions) {
        result.set(node.name, conditions);
      }
    }
    return result;
  }

  public resources(): Map<string, NodeResourceView> {
    return byName(this.items, (node) => node.resources);
  }

  public stats(): Map<string, StatsSnapshot> {
    return byName(this.items, (node) => node.stats);
  }

  public clusterResources(): NodeResourceView {
    return foldAll([...this.resources().values()], add, undefined, 'node resources');
  }

  /**
   * Sum of the numeric node statistics. The summed timestamps are divided by
   * the number of nodes, giving the mean sample time to one decimal.
   */
  public clusterStats(): ClusterStats {
    const stats = [...this.stats().values()].map(
      (snapshot): ClusterStats => ({ ...toNumericTree(snapshot), timestamp: snapshot.timestamp }),
    );
    const result = foldAll(stats, add, undefined, 'node statistics');
    result.timestamp = Math.round((result.timestamp / stats.length) * 10) / 10;
    return result;
  }
}
