import Sentiment from "sentiment";
import type { ContactSentiment, MessageRecord, SentimentScore } from "../types.js";
import { compareKeys, partitionByContact } from "../utils/messages.js";
import { mean, round } from "../utils/stats.js";

// Maps an unbounded lexicon sum onto (-1, 1); 15 is the usual normalisation constant.
const COMPOUND_ALPHA = 15;

export const NEUTRAL_SCORE: SentimentScore = Object.freeze({ compound: 0, pos: 0, neu: 0, neg: 0 });

const analyzer = new Sentiment();

export function normalizeCompound(score: number): number {
  return score / Math.sqrt(score * score + COMPOUND_ALPHA);
}

function analyze(text: string) {
  try {
    return analyzer.analyze(text);
  } catch (err) {
    console.warn("[sentiment] unscorable text", { error: (err as Error)?.message ?? err });
    return null;
  }
}

/**
 * AFINN lexicon score for one message. `pos`, `neg` and `neu` are the shares
 * of positive weight, negative weight and unscored tokens; empty or
 * unscorable text gives the zero vector.
 */
export function scoreSentiment(text: string | null | undefined): SentimentScore {
  if (!text || !text.trim()) return NEUTRAL_SCORE;
  const result = analyze(text);
  if (!result) return NEUTRAL_SCORE;

  const tokens = result.tokens.filter((t) => t.length > 0);
  if (tokens.length === 0) return NEUTRAL_SCORE;

  let posSum = 0;
  let negSum = 0;
  let scored = 0;
  for (const entry of result.calculation) {
    for (const value of Object.values(entry)) {
      scored++;
      if (value > 0) posSum += value;
      else if (value < 0) negSum += -value;
    }
  }
  const neutral = Math.max(0, tokens.length - scored);
  const total = posSum + negSum + neutral;
  if (total === 0) return NEUTRAL_SCORE;

  return {
    compound: round(normalizeCompound(result.score), 4),
    pos: round(posSum / total, 3),
    neu: round(neutral / total, 3),
    neg: round(negSum / total, 3),
  };
}

/** Mean scores per contact over every message, both directions, for contacts with enough messages. */
export function sentimentByContact(
  messages: readonly MessageRecord[],
  minMessages: number,
  score: (text: string | null | undefined) => SentimentScore = scoreSentiment
): ContactSentiment[] {
  const out: ContactSentiment[] = [];
  for (const [contactKey, list] of partitionByContact(messages)) {
    if (list.length < minMessages) continue;
    const scores = list.map((m) => score(m.text));
    out.push({
      contactKey,
      total: list.length,
      avgCompound: mean(scores.map((s) => s.compound)) ?? 0,
      avgPositive: mean(scores.map((s) => s.pos)) ?? 0,
      avgNegative: mean(scores.map((s) => s.neg)) ?? 0,
    });
  }
  return out.sort((a, b) => b.avgCompound - a.avgCompound || compareKeys(a.contactKey, b.contactKey));
}
