import { z } from 'zod';
import { IdentityMismatchError } from '../ErrorHandling.js';
import { JsonObject } from '../utils/StructuralMerge.js';

export const DescribedObjectSchema = z.object({
  kind: z.string(),
  namespace: z.string().optional(),
  name: z.string(),
  apiVersion: z.string().optional(),
});

export type DescribedObject = z.infer<typeof DescribedObjectSchema>;

export const MetricValueSchema = z.object({
  describedObject: DescribedObjectSchema,
  metricName: z.string(),
  value: z.string().nullish(),
});

// custom.metrics.k8s.io/v1beta1 MetricValueList
export const MetricValueListSchema = z.object({
  items: z.array(MetricValueSchema).default([]),
});

export type MetricValue = z.infer<typeof MetricValueSchema>;

export type DescribedMetricView = {
  from_object: JsonObject;
  metrics: Record<string, string | null>;
};

export type CombineResult<T> =
  | { success: true; value: T }
  | { success: false; error: IdentityMismatchError };

function describe(object: DescribedObject): string {
  return `${object.kind} ${object.namespace ? `${object.namespace}/` : ''}${object.name}`;
}

export function sameObject(left: DescribedObject, right: DescribedObject): boolean {
  return (
    left.kind === right.kind &&
    left.namespace === right.namespace &&
    left.name === right.name &&
    left.apiVersion === right.apiVersion
  );
}

/**
 * Metric values reported for one described object
 */
export class DescribedMetric {
  constructor(
    public readonly describedObject: DescribedObject,
    public readonly metrics: Readonly<Record<string, string | null>>,
  ) {}

  public static fromValue(value: MetricValue): DescribedMetric {
    return new DescribedMetric(value.describedObject, { [value.metricName]: value.value ?? null });
  }

  /**
   * Union of both metric mappings, `other` winning on shared names. Fails when
   * the two records describe different objects.
   */
  public combine(other: DescribedMetric): CombineResult<DescribedMetric> {
    if (!sameObject(this.describedObject, other.describedObject)) {
      return {
        success: false,
        error: new IdentityMismatchError(
          describe(this.describedObject),
          describe(other.describedObject),
        ),
      };
    }
    return {
      success: true,
      value: new DescribedMetric(this.describedObject, { ...this.metrics, ...other.metrics }),
    };
  }

  public toJSON(): DescribedMetricView {
    const fromObject: JsonObject = {};
    for (const [key, value] of Object.entries(this.describedObject)) {
      if (value !== undefined) {
        fromObject[key] = value;
      }
    }
    return { from_object: fromObject, metrics: { ...this.metrics } };
  }
}

/**
 * The result of one metric query, in the order the API returned the objects
 */
export class MetricList {
  constructor(public readonly items: readonly DescribedMetric[]) {}

  public static fromResponse(body: unknown): MetricList {
    const parsed = MetricValueListSchema.parse(body);
    return new MetricList(parsed.items.map((item) => DescribedMetric.fromValue(item)));
  }

  /**
   * Combine position by position. The longer list is cut to the shorter one.
   */
  public combine(other: MetricList): CombineResult<MetricList> {
    const length = Math.min(this.items.length, other.items.length);
    const combined: DescribedMetric[] = [];
    for (let i = 0; i < length; i++) {
      const result = this.items[i].combine(other.items[i]);
      if (!result.success) {
        return result;
      }
      combined.push(result.value);
    }
    return { success: true, value: new MetricList(combined) };
  }

  public listMetrics(): DescribedMetricView[] {
    return this.items.map((item) => item.toJSON());
  }
}

/**
 * Fold several query results for the same namespace into one list of
 * composite records.
 */
export function combineSeries(series: readonly MetricList[]): CombineResult<MetricList> {
  const [first, ...rest] = series;
  if (!first) {
    return { success: true, value: new MetricList([]) };
  }
  let acc = first;
  for (const next of rest) {
    const result = acc.combine(next);
    if (!result.success) {
      return result;
    }
    acc = result.value;
  }
  return { success: true, value: acc };
}
