import type { RenderResult, RenderSpec, SaveTarget } from '../types/RenderSpec';

/**
 * ITextCompositor Port Interface
 *
 * Renders personalized text onto a copy of a template image.
 *
 * **Failures:**
 * - NotFoundError('template') when templatePath does not exist
 * - Anything the imaging backend throws for an unreadable template
 *
 * Either way only the one card is lost; callers continue with the next event.
 */
export interface ITextCompositor {
  render(
    templatePath: string,
    text: string,
    spec: RenderSpec,
    saveTo?: SaveTarget
  ): Promise<RenderResult>;
}
