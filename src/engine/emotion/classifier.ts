import type { FaceImage } from "../../shared/types/detection";
import { EMOTION_LABELS, type EmotionLabel } from "../../shared/types/emotion";

export interface EmotionClassifier {
  classify(croppedImage: FaceImage): Promise<EmotionLabel>;
}

/**
 * Stand-in used when no emotion model is available: a uniformly random label
 * from the same fixed set.
 */
export class RandomEmotionClassifier implements EmotionClassifier {
  private readonly random: () => number;

  constructor(random: () => number = Math.random) {
    this.random = random;
  }

  async classify(_croppedImage: FaceImage): Promise<EmotionLabel> {
    const index = Math.min(
      EMOTION_LABELS.length - 1,
      Math.floor(this.random() * EMOTION_LABELS.length),
    );
    return EMOTION_LABELS[Math.max(0, index)];
  }
}
