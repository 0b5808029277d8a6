import Ajv from 'ajv'
import batchSchemaJson from '../../schemas/batch.schema.json'
import { BatchError } from './errors'
import type { Batch } from './types'

const ajv = new Ajv({ allErrors: true, strict: false })
const validate = ajv.compile<Batch>(batchSchemaJson)

/**
 * Structural check of a batch handed over by the data collaborator. Short or empty series and
 * missing metadata are accepted here; the gates fail those instruments individually.
 */
export function parseBatch(raw: unknown): Batch {
  if (!validate(raw)) {
    const errors = (validate.errors || []).slice(0, 10).map(e => `${e.instancePath || '/'} ${e.message || 'invalid'}`)
    throw new BatchError(`Invalid batch: ${errors.join('; ')}`)
  }
  return raw
}
