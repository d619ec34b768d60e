/**
 * Case connector types: remote DTOs (validated with zod at the wire
 * boundary) and the local mirror record.
 */

import { z } from "zod";

// ─── Remote DTOs ───

const optionalString = z.string().nullish();
const optionalNumber = z.number().nullish();
const optionalBool = z.boolean().nullish();
/** Dates travel as ISO `YYYY-MM-DD` strings. */
const optionalDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}/, "expected an ISO date")
  .nullish();

/**
 * A case as returned by the remote API. Only `id` and `logical_timestamp`
 * drive synchronization; everything else is opaque payload, so unknown
 * fields pass through untouched.
 */
export const RemoteCaseSchema = z
  .object({
    id: z.number().int(),
    logical_timestamp: z.number().int().nullish(),
    name: optionalString,
    number: optionalString,
    customer: optionalString,
    case_state: optionalString,
    creation_date: optionalDate,
    start_date: optionalDate,
    end_date: optionalDate,
    active: optionalBool,
    hour_budget: optionalNumber,
    uuid: optionalString,
  })
  .passthrough();

export type RemoteCase = z.infer<typeof RemoteCaseSchema>;

export const PageMetaSchema = z.object({
  limit: z.number().int(),
  next: z.string().nullish(),
  offset: z.number().int().nullish(),
  previous: z.string().nullish(),
  total_count: z.number().int(),
});

export const CaseListResponseSchema = z.object({
  meta: PageMetaSchema,
  objects: z.array(RemoteCaseSchema),
});

export type CaseListResponse = z.infer<typeof CaseListResponseSchema>;

/** Writable fields shared by create and update requests. */
const caseWritableFields = {
  responsible: optionalString,
  co_responsible: optionalString,
  case_state: optionalString,
  customer: optionalString,
  case_group: optionalString,
  department: optionalString,
  parent: optionalString,
  priority: optionalString,
  customer_name: optionalString,
  customer_street_address: optionalString,
  customer_zip_code: optionalString,
  customer_city: optionalString,
  customer_country: optionalString,
  customer_latitude: optionalNumber,
  customer_longitude: optionalNumber,
  start_date: optionalDate,
  end_date: optionalDate,
  number: optionalString,
  name: optionalString,
  notes: optionalString,
  hour_budget: optionalNumber,
  street_address: optionalString,
  zip_code: optionalString,
  city: optionalString,
  country: optionalString,
  latitude: optionalNumber,
  longitude: optionalNumber,
  remarks_required: optionalBool,
  file_upload_required: optionalBool,
  active: optionalBool,
  permit_new_workreports: optionalBool,
  geofence: optionalBool,
  creation_id: optionalString,
};

export const CaseCreateSchema = z
  .object({
    ...caseWritableFields,
    customer: z.string().min(1),
    number: z.string().min(1),
    name: z.string().min(1),
  })
  .strict();

export type CaseCreateInput = z.infer<typeof CaseCreateSchema>;

export const CaseUpdateSchema = z.object(caseWritableFields).strict();

export type CaseUpdateInput = z.infer<typeof CaseUpdateSchema>;

// ─── Stream ───

export interface Page {
  records: RemoteCase[];
  hasMore: boolean;
  /** Highest id on the page; absent for an empty page. */
  maxId?: number;
  offset: number;
}

// ─── Local Mirror ───

export interface CaseRecord {
  id: number;
  version: number;
  /** JSON serialisation of the full remote case. */
  payload: string;
}

export function versionOf(remote: RemoteCase): number {
  return remote.logical_timestamp ?? 0;
}

export function toCaseRecord(remote: RemoteCase): CaseRecord {
  return {
    id: remote.id,
    version: versionOf(remote),
    payload: JSON.stringify(remote),
  };
}
