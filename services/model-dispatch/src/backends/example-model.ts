import type { BackendModule } from '../types/index.js';
import { parseImagePayload } from './image-hash.js';

const CLASSES = ['example_class_a', 'example_class_b'];

/**
 * Template backend: validates the payload and returns a fixed classification.
 * New prediction services start from this shape.
 */
export function createExampleModelBackend(): BackendModule {
  return {
    name: 'example_model',
    capability: 'predict',
    async process(payload, context) {
      const imageRef = parseImagePayload(payload);
      await context.checkpoint();
      return {
        image_ref: imageRef,
        classes: CLASSES,
        result: { example_class_a: 0.75, example_class_b: 0.25 }
      };
    }
  };
}
