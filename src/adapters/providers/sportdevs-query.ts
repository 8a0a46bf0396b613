import type { ProviderQuery, QueryParams } from '../provider-types.js';

type Scalar = string | number;

/**
 * Builder for SportDevs' PostgREST-style filters, where every filter is a
 * query param of the form `property=operator.value`.
 *
 * @example
 * endpoint('/matches').property('tournament_id').equals(42).limit(50).build()
 * // { path: '/matches', params: { tournament_id: 'eq.42', limit: 50 } }
 */
export class SportDevsQuery {
  private readonly params: QueryParams = {};
  private current: string | undefined;

  constructor(private readonly path: string) {}

  property(name: string): this {
    this.current = name;
    return this;
  }

  equals(value: Scalar): this {
    return this.filter(`eq.${value}`);
  }

  notEquals(value: Scalar): this {
    return this.filter(`not.eq.${value}`);
  }

  greaterThan(value: Scalar): this {
    return this.filter(`gt.${value}`);
  }

  greaterThanOrEqual(value: Scalar): this {
    return this.filter(`gte.${value}`);
  }

  lessThan(value: Scalar): this {
    return this.filter(`lt.${value}`);
  }

  lessThanOrEqual(value: Scalar): this {
    return this.filter(`lte.${value}`);
  }

  like(pattern: string): this {
    return this.filter(`like.${pattern}`);
  }

  ilike(pattern: string): this {
    return this.filter(`ilike.${pattern}`);
  }

  in(...values: Scalar[]): this {
    return this.filter(`in.(${values.join(',')})`);
  }

  isNull(): this {
    return this.filter('is.null');
  }

  isNotNull(): this {
    return this.filter('not.is.null');
  }

  limit(value: number): this {
    this.params.limit = value;
    return this;
  }

  offset(value: number): this {
    this.params.offset = value;
    return this;
  }

  select(...properties: string[]): this {
    this.params.select = properties.join(',');
    return this;
  }

  orderAsc(property: string): this {
    this.params.order = `${property}.asc`;
    return this;
  }

  orderDesc(property: string): this {
    this.params.order = `${property}.desc`;
    return this;
  }

  build(): ProviderQuery {
    return { path: this.path, params: { ...this.params } };
  }

  toUrl(): string {
    const entries = Object.entries(this.params).map(([key, value]): [string, string] => [key, String(value)]);
    if (entries.length === 0) return this.path;
    return `${this.path}?${new URLSearchParams(entries).toString()}`;
  }

  private filter(expression: string): this {
    if (!this.current) {
      throw new Error(`SportDevs filter '${expression}' needs a property() first`);
    }
    this.params[this.current] = expression;
    return this;
  }
}

export function endpoint(path: string): SportDevsQuery {
  return new SportDevsQuery(path);
}
