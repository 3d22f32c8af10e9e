import { z } from "zod";
import { buildDynamic, lazilyValidate } from "@lexalign/shared";

const environmentSchema = z.object({
  TOKENIZER_SCRIPT: z.string().default("resources/tokenizer/tokenizer.perl"),
  BPE_SEPARATOR: z.string().default("@@"),
  SEGMENTER_CACHE_SIZE: z.number().int().positive().default(65536),
});

export const variables = lazilyValidate(
  environmentSchema,
  buildDynamic(environmentSchema),
);
