import type { ImageProviderName, Orientation } from '../../config/settings';

/** One image backend: prompt in, encoded image bytes out. */
export interface ImageProvider {
  readonly name: ImageProviderName;
  isConfigured(): boolean;
  generate(prompt: string, orientation: Orientation): Promise<Buffer>;
}
