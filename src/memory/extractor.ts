import type { ContentExtractor } from "./types.js";

const MIN_TOPIC_WORD_LENGTH = 3;

function topicWords(topic: string): string[] {
  return topic
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length >= MIN_TOPIC_WORD_LENGTH)
    .map((word) => (word.length > MIN_TOPIC_WORD_LENGTH && word.endsWith("s") ? word.slice(0, -1) : word));
}

export function matchesTopic(text: string, topic: string): boolean {
  const lowerText = text.toLowerCase();
  const lowerTopic = topic.trim().toLowerCase();
  if (!lowerTopic) return false;
  if (lowerText.includes(lowerTopic)) return true;

  const words = topicWords(lowerTopic);
  return words.length > 0 && words.every((word) => lowerText.includes(word));
}

/**
 * Stand-in for an LLM extractor: keeps the whole conversation when any topic
 * matches it, by phrase or by all of its (singularised) words.
 */
export class TopicMatchExtractor implements ContentExtractor {
  async extract(conversationText: string, topics: readonly string[]): Promise<string | null> {
    if (!conversationText.trim()) return null;
    return topics.some((topic) => matchesTopic(conversationText, topic)) ? conversationText : null;
  }
}
