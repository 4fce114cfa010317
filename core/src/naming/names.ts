/**
 * Tenant, Namespace and Topic Names
 *
 * A namespace is addressed as `tenant/namespace`. A topic is addressed as
 * `<domain>://<tenant>/<namespace>/<local-name>`, where the local name becomes
 * the SQL table name. Partitions of a partitioned topic carry a
 * `-partition-<n>` suffix on the local name.
 *
 * @example
 * ```ts
 * const topic = TopicName.parse('persistent://public/default/orders-partition-3');
 * topic.localName;                      // 'orders-partition-3'
 * topic.partitionIndex;                 // 3
 * topic.partitionedTopicName.localName; // 'orders'
 * topic.namespace.toString();           // 'public/default'
 * ```
 */

// ============================================================================
// Constants
// ============================================================================

/** Separator between tenant and namespace in the canonical form */
export const NAMESPACE_SEPARATOR = '/';

/** Suffix that marks one partition of a partitioned topic */
export const PARTITIONED_TOPIC_SUFFIX = '-partition-';

export type TopicDomain = 'persistent' | 'non-persistent';

const PARTITION_PATTERN = /^(.+)-partition-(\d+)$/;

// ============================================================================
// NamespaceName
// ============================================================================

/**
 * Compound tenant + namespace identifier.
 */
export class NamespaceName {
  private constructor(
    readonly tenant: string,
    readonly localName: string
  ) {}

  static of(tenant: string, namespace: string): NamespaceName {
    if (!tenant || !namespace) {
      throw new Error(`Invalid namespace name: ${tenant}/${namespace}`);
    }
    if (tenant.includes(NAMESPACE_SEPARATOR) || namespace.includes(NAMESPACE_SEPARATOR)) {
      throw new Error(`Invalid namespace name: ${tenant}/${namespace}`);
    }
    return new NamespaceName(tenant, namespace);
  }

  /**
   * Parse the canonical `tenant/namespace` form.
   */
  static parse(value: string): NamespaceName {
    const parts = value.split(NAMESPACE_SEPARATOR);
    if (parts.length !== 2) {
      throw new Error(`Invalid namespace name: ${value}`);
    }
    const [tenant, namespace] = parts;
    return NamespaceName.of(tenant, namespace);
  }

  /**
   * Like {@link parse} but returns undefined instead of throwing.
   */
  static tryParse(value: string): NamespaceName | undefined {
    try {
      return NamespaceName.parse(value);
    } catch {
      return undefined;
    }
  }

  equals(other: NamespaceName): boolean {
    return this.tenant === other.tenant && this.localName === other.localName;
  }

  toString(): string {
    return `${this.tenant}${NAMESPACE_SEPARATOR}${this.localName}`;
  }
}

// ============================================================================
// TopicName
// ============================================================================

/**
 * Fully qualified topic identifier.
 */
export class TopicName {
  /** Partition number, or -1 when this is not a partition */
  readonly partitionIndex: number;

  private constructor(
    readonly domain: TopicDomain,
    readonly namespace: NamespaceName,
    readonly localName: string
  ) {
    const match = PARTITION_PATTERN.exec(localName);
    this.partitionIndex = match ? Number(match[2]) : -1;
  }

  static of(namespace: NamespaceName, localName: string, domain: TopicDomain = 'persistent'): TopicName {
    if (!localName || localName.includes(NAMESPACE_SEPARATOR)) {
      throw new Error(`Invalid topic name: ${namespace.toString()}/${localName}`);
    }
    return new TopicName(domain, namespace, localName);
  }

  /**
   * Parse either the fully qualified form or the short
   * `tenant/namespace/topic` form (which implies the persistent domain).
   */
  static parse(value: string): TopicName {
    let domain: TopicDomain = 'persistent';
    let rest = value;

    const schemeEnd = value.indexOf('://');
    if (schemeEnd >= 0) {
      const scheme = value.slice(0, schemeEnd);
      if (scheme !== 'persistent' && scheme !== 'non-persistent') {
        throw new Error(`Invalid topic domain: ${value}`);
      }
      domain = scheme;
      rest = value.slice(schemeEnd + 3);
    }

    const parts = rest.split(NAMESPACE_SEPARATOR);
    if (parts.length !== 3) {
      throw new Error(`Invalid topic name: ${value}`);
    }
    const [tenant, namespace, localName] = parts;
    return TopicName.of(NamespaceName.of(tenant, namespace), localName, domain);
  }

  get isPartition(): boolean {
    return this.partitionIndex >= 0;
  }

  /**
   * The logical topic this partition belongs to. Returns itself for topics
   * that are not partitions.
   */
  get partitionedTopicName(): TopicName {
    if (!this.isPartition) {
      return this;
    }
    const base = this.localName.slice(0, this.localName.lastIndexOf(PARTITIONED_TOPIC_SUFFIX));
    return new TopicName(this.domain, this.namespace, base);
  }

  /**
   * Name of partition `index` of this topic.
   */
  partition(index: number): TopicName {
    return new TopicName(
      this.domain,
      this.namespace,
      `${this.partitionedTopicName.localName}${PARTITIONED_TOPIC_SUFFIX}${index}`
    );
  }

  /**
   * Key the schema registry stores this topic's schema under.
   */
  get schemaName(): string {
    return `${this.namespace.toString()}${NAMESPACE_SEPARATOR}${this.partitionedTopicName.localName}`;
  }

  equals(other: TopicName): boolean {
    return this.toString() === other.toString();
  }

  toString(): string {
    return `${this.domain}://${this.namespace.toString()}${NAMESPACE_SEPARATOR}${this.localName}`;
  }
}
