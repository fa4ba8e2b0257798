import { z } from "zod";

export const parseOptionsSchema = z.object({
  options: z.string().describe("asn1 keyword argument, e.g. 'oversize_length 1024, absolute_offset 10'"),
});
export type ParseOptionsArgs = z.infer<typeof parseOptionsSchema>;

export const validateOptionsSchema = z.object({
  options: z.string().describe("asn1 keyword argument to check without storing the result"),
});
export type ValidateOptionsArgs = z.infer<typeof validateOptionsSchema>;

export const getOptionsSchema = z.object({
  handle: z.string().min(1).describe("Handle returned by parse_asn1_options"),
});
export type GetOptionsArgs = z.infer<typeof getOptionsSchema>;

export const releaseOptionsSchema = z.object({
  handle: z.string().min(1).describe("Handle returned by parse_asn1_options; released handles can no longer be read"),
});
export type ReleaseOptionsArgs = z.infer<typeof releaseOptionsSchema>;
