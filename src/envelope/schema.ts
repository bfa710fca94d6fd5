import { z } from 'zod';

/** Wire shape of the envelope's `error` object. */
export const apiErrorWireSchema = z.object({
  code: z.number().int().nullish(),
  message: z.string().nullish(),
});

/** Wire shape of the envelope's `pagination` object. */
export const pageInfoWireSchema = z.object({
  has_more: z.boolean().nullish(),
  page_number: z.number().int().nonnegative().nullish(),
  page_size: z.number().int().nonnegative().nullish(),
  total_count: z.number().int().nonnegative().nullish(),
});

/** Outer envelope; `data` is left unknown and validated separately against the endpoint's schema. */
export const envelopeWireSchema = z.object({
  data: z.unknown(),
  error: apiErrorWireSchema.nullish(),
  pagination: pageInfoWireSchema.nullish(),
});

/** Just enough of an envelope to pull error details out of a non-2xx body. */
export const errorEnvelopeWireSchema = z.object({
  error: apiErrorWireSchema.nullish(),
});

export type ApiErrorWire = z.infer<typeof apiErrorWireSchema>;
export type PageInfoWire = z.infer<typeof pageInfoWireSchema>;
