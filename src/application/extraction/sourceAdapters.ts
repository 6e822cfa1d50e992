import type { SourceAdapterRegistry } from './ExtractionStrategy.ts'
import type { OcrTextProvider, PageSource, VisionRecipeProvider } from './providers.ts'
import { ManualFormStrategy, ManualTextStrategy } from './strategies/manualStrategies.ts'
import { OcrTextStrategy, VisionStrategy } from './strategies/imageStrategies.ts'
import { JsonLdStrategy, MicrodataStrategy, PageTextStrategy } from './strategies/urlStrategies.ts'

export interface SourceAdapterDeps {
  vision: VisionRecipeProvider
  ocr: OcrTextProvider
  pages: PageSource
}

/** The default strategy chains, primary strategy first. */
export function createSourceAdapters(deps: SourceAdapterDeps): SourceAdapterRegistry {
  return {
    manual: { modality: 'manual', strategies: [new ManualFormStrategy(), new ManualTextStrategy()] },
    image: { modality: 'image', strategies: [new VisionStrategy(deps.vision), new OcrTextStrategy(deps.ocr)] },
    url: {
      modality: 'url',
      strategies: [new JsonLdStrategy(deps.pages), new MicrodataStrategy(deps.pages), new PageTextStrategy(deps.pages)],
    },
  }
}
