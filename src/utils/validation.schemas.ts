import { z } from 'zod';
import type { IncidentRecord } from '../types/discipline.types';
import { ValidationError } from './errors';

// Loader output: plain objects of scalar cells
export const incidentFieldSchema = z.union([z.string(), z.number(), z.boolean(), z.null(), z.undefined()]);

export const incidentRecordSchema = z.record(z.string(), incidentFieldSchema);

export const incidentRecordsSchema = z.array(incidentRecordSchema);

export function parseIncidentRecords(input: unknown): readonly IncidentRecord[] {
  const result = incidentRecordsSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Incident records must be an array of plain objects with scalar values', result.error.issues);
  }
  return Object.freeze(result.data.map((record): IncidentRecord => Object.freeze(record)));
}
