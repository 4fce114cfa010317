/**
 * Topic listing with partition coalescing.
 *
 * The directory reports every partition of a partitioned topic as its own
 * topic (`orders-partition-0`, `orders-partition-1`, ...). The catalog shows
 * them as one table, `orders`.
 */

import { noopLogger, type Logger } from '../logger.js';
import { NamespaceName, TopicName } from '../naming/names.js';
import type { SchemaTableName } from '../metadata/types.js';
import type { TopicDirectory } from './types.js';

export class TopicCatalog {
  constructor(
    private readonly directory: TopicDirectory,
    private readonly logger: Logger = noopLogger
  ) {}

  /**
   * Logical topics of a namespace, in discovery order: topics the directory
   * lists first, then partitioned topics with no partition listed.
   */
  async listTopics(namespace: NamespaceName): Promise<TopicName[]> {
    const key = namespace.toString();
    const seen = new Set<string>();
    const result: TopicName[] = [];

    const add = (value: string): void => {
      let topic: TopicName;
      try {
        topic = TopicName.parse(value).partitionedTopicName;
      } catch (error) {
        this.logger.warn('Ignoring malformed topic name', {
          namespace: key,
          topic: value,
          reason: error instanceof Error ? error.message : String(error),
        });
        return;
      }
      if (!topic.namespace.equals(namespace) || seen.has(topic.localName)) {
        return;
      }
      seen.add(topic.localName);
      result.push(topic);
    };

    for (const value of await this.directory.listTopics(key)) {
      add(value);
    }
    for (const value of await this.directory.listPartitionedTopics(key)) {
      add(value);
    }

    return result;
  }

  /**
   * Tables of a namespace. `schemaName` is echoed back as given so callers
   * see the spelling they asked for.
   */
  async listTables(schemaName: string, namespace: NamespaceName): Promise<SchemaTableName[]> {
    const topics = await this.listTopics(namespace);
    return topics.map((topic) => ({ schemaName, tableName: topic.localName }));
  }

  /**
   * Logical topic backing `tableName`, or undefined.
   */
  async findTopic(namespace: NamespaceName, tableName: string): Promise<TopicName | undefined> {
    const topics = await this.listTopics(namespace);
    return topics.find((topic) => topic.localName === tableName);
  }
}
