export const EMOTION_LABELS = [
  "angry",
  "disgusted",
  "sad",
  "fearful",
  "happy",
  "surprised",
  "neutral",
] as const;

export type EmotionLabel = (typeof EMOTION_LABELS)[number];

export type EmotionCounts = Record<EmotionLabel, number>;

export const NEUTRAL_EMOTION: EmotionLabel = "neutral";

export const createEmotionCounts = (): EmotionCounts => {
  return {
    angry: 0,
    disgusted: 0,
    sad: 0,
    fearful: 0,
    happy: 0,
    surprised: 0,
    neutral: 0,
  };
};

/** Most frequent label; ties resolve in label order, an empty tally is neutral. */
export const dominantEmotion = (counts: EmotionCounts): EmotionLabel => {
  let winner: EmotionLabel = NEUTRAL_EMOTION;
  let best = 0;
  for (const label of EMOTION_LABELS) {
    if (counts[label] > best) {
      best = counts[label];
      winner = label;
    }
  }
  return winner;
};
