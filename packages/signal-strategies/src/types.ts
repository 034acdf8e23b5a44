import { z } from "zod";

const period = z.number().int().positive();

export const maTrendParamsSchema = z.object({
  /** Bars back for the momentum close comparison. */
  p1: period.default(13),
  /** Medium EMA period; its slope confirms direction. */
  p2: period.default(21),
  /** Long EMA period; a near-flat or favourable slope gates entries. */
  p3: period.default(55),
});

export type MaTrendParams = z.infer<typeof maTrendParamsSchema>;

export const smaCrossParamsSchema = z
  .object({
    fast: period.default(10),
    slow: period.default(30),
  })
  .refine((params) => params.fast < params.slow, {
    message: "fast period must be shorter than slow period",
    path: ["fast"],
  });

export type SmaCrossParams = z.infer<typeof smaCrossParamsSchema>;

export const maTrendParamsJsonSchema = z.toJSONSchema(maTrendParamsSchema);
export const smaCrossParamsJsonSchema = z.toJSONSchema(smaCrossParamsSchema);
