import type { FaceImage, ObservedFace } from "../../shared/types/detection";

/**
 * Face detection and feature extraction for one encoded image. Implementations
 * wrap whatever model is available; an image with no face resolves to `[]`.
 */
export interface FaceDetector {
  detect(image: FaceImage): Promise<ObservedFace[]>;
}
