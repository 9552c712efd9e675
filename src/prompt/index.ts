/**
 * Request Formatter
 *
 * Fills a request template from a sample. Placeholders:
 *
 * - {payload}: the sample text
 * - {reference_label}: the label being checked
 * - {sample_id}
 * - {meta.<column>}: any metadata column
 *
 * Unknown placeholders are left untouched, so templates may contain literal
 * braces (JSON examples) without escaping.
 */

import { readFileSync } from 'node:fs'
import type { Sample } from '../types'

/** Matches {name} and {meta.column} */
const PLACEHOLDER_REGEX = /\{(payload|reference_label|sample_id|meta\.([^{}\n]+))\}/g

export const DEFAULT_TEMPLATE = `You are checking whether a classification code fits a description.

Description:
{payload}

Proposed code: {reference_label}

Respond with a single JSON object:
{"is_correct": true or false, "confidence_score": 0.0 to 1.0, "reasoning": "one or two sentences", "alternative_codes": ["codes that fit better, if any"]}`

export class TemplateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TemplateError'
  }
}

/**
 * Fill a template for one sample.
 *
 * @throws TemplateError when a {meta.<column>} placeholder names a column the sample lacks
 */
export function formatRequest(template: string, sample: Sample): string {
  return template.replace(PLACEHOLDER_REGEX, (_match, name: string, column: string | undefined) => {
    if (column !== undefined) {
      const value = sample.metadata[column]
      if (value === undefined) {
        throw new TemplateError(`Sample ${sample.id} has no metadata column "${column}"`)
      }
      return value
    }
    switch (name) {
      case 'payload':
        return sample.payload
      case 'reference_label':
        return sample.referenceLabel
      default:
        return sample.id
    }
  })
}

/**
 * Load a template file. Empty templates are rejected.
 */
export function loadTemplate(path: string): string {
  const template = readFileSync(path, 'utf-8')
  if (!template.trim()) {
    throw new TemplateError(`Template is empty: ${path}`)
  }
  return template
}

/**
 * Request builder for runPass.
 */
export function createRequestBuilder(template: string): (sample: Sample) => string {
  return (sample) => formatRequest(template, sample)
}
