export interface ParsedTopic {
  /** The part before the first colon (e.g. `"post"`). */
  namespace: string
  /** Everything after the first colon, or `null` for bare topics. */
  id: string | null
  /** The original topic string. */
  raw: string
}

/**
 * Builds a topic key from a namespace and an optional id.
 *
 * @example
 * topicFor('post', 'p1') // → 'post:p1'
 * topicFor('space_user', 'su-4') // → 'space_user:su-4'
 * topicFor('lobby') // → 'lobby'
 */
export function topicFor(namespace: string, id?: string): string {
  return id === undefined ? namespace : `${namespace}:${id}`
}

/**
 * Inverse of {@link topicFor}. Only the first colon separates the namespace,
 * so ids may contain colons themselves.
 *
 * @example
 * parseTopic('post:p1')
 * // → { namespace: 'post', id: 'p1', raw: 'post:p1' }
 */
export function parseTopic(topic: string): ParsedTopic {
  const colonIdx = topic.indexOf(':')
  if (colonIdx === -1) {
    return { namespace: topic, id: null, raw: topic }
  }
  return {
    namespace: topic.slice(0, colonIdx),
    id: topic.slice(colonIdx + 1),
    raw: topic,
  }
}
