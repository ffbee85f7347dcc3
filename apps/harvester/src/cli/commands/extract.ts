import { CatalogStore } from '../../catalog/catalog-store.js'
import { classifyError, EXIT_CODES } from '../../errors.js'
import { ModelExtractor } from '../../extractor/model-extractor.js'
import { ModelValidator } from '../../validation/model-validator.js'

export interface ExtractCommandArgs {
  title: string
  description?: string
  catalogPath?: string
  correctionsPath?: string
}

/**
 * Run one title (and optional description) through extraction and
 * validation and print the outcome as JSON.
 */
export async function runExtractCommand(args: ExtractCommandArgs): Promise<number> {
  if (!args.title.trim()) {
    console.error('Missing --title')
    return EXIT_CODES.INVALID_INPUT
  }

  let catalog: CatalogStore
  try {
    catalog = await CatalogStore.load({
      ...(args.catalogPath ? { catalogPath: args.catalogPath } : {}),
      ...(args.correctionsPath ? { correctionsPath: args.correctionsPath } : {}),
    })
  } catch (error) {
    const classified = classifyError(error)
    console.error(classified.message)
    return classified.exitCode
  }

  const validator = new ModelValidator(catalog)
  const extraction = new ModelExtractor(catalog, validator).extract(args.title, args.description ?? '')
  const validation = extraction.ok ? validator.validate(extraction.model) : null

  console.log(JSON.stringify({ title: args.title, extraction, validation }, null, 2))
  return extraction.ok && validation?.status !== 'rejected' ? EXIT_CODES.OK : EXIT_CODES.FAILURE
}
