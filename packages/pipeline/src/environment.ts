import { z } from "zod";
import { buildDynamic, lazilyValidate } from "@lexalign/shared";

const environmentSchema = z.object({
  BEAM_SIZE: z.number().int().positive().default(5),
  LENGTH_FACTOR: z.number().positive().default(1.5),
  BPE_SEPARATOR: z.string().default("@@"),
});

export const variables = lazilyValidate(
  environmentSchema,
  buildDynamic(environmentSchema),
);
