// lib/inference/segmentation-contract.ts
import { z } from 'zod';

export const REQUIRED_FEATURES = ['Age', 'Income', 'Purchases', 'Gender'] as const;

export const CustomerFeaturesSchema = z.object({
  Customer_ID: z.union([z.string(), z.number()]).optional(),
  Age: z.number().positive(),
  Income: z.number().nonnegative(),
  Purchases: z.number().int().nonnegative(),
  Gender: z.string().min(1),
});

/** A single record, a list of records, or `{instances: [...]}`. */
export const SegmentationRequestSchema = z.union([
  CustomerFeaturesSchema,
  z.array(CustomerFeaturesSchema).min(1),
  z.object({ instances: z.array(CustomerFeaturesSchema).min(1) }),
]);

export const SegmentPredictionSchema = z.object({
  cluster_id: z.number().int().nonnegative(),
  segment: z.string(),
  confidence: z.number().min(0).max(1).optional(),
  distance_to_center: z.number().nonnegative().optional(),
});

export const SegmentationResponseSchema = z.object({
  predictions: z.array(SegmentPredictionSchema),
  model_metadata: z.record(z.unknown()).optional(),
});

export type CustomerFeatures = z.infer<typeof CustomerFeaturesSchema>;
export type SegmentationRequest = z.infer<typeof SegmentationRequestSchema>;
export type SegmentPrediction = z.infer<typeof SegmentPredictionSchema>;
export type SegmentationResponse = z.infer<typeof SegmentationResponseSchema>;

export function countRecords(request: SegmentationRequest): number {
  if (Array.isArray(request)) return request.length;
  if ('instances' in request) return request.instances.length;
  return 1;
}

export const SAMPLE_CUSTOMER: CustomerFeatures = {
  Age: 30,
  Income: 50000,
  Purchases: 10,
  Gender: 'Male',
};
