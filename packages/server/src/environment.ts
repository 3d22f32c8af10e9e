import { z } from "zod";
import { lazilyValidate, buildDynamic } from "@lexalign/shared";

const environmentSchema = z.object({
  PORT: z.number().int().nonnegative().default(5007),
  HOST: z.string().default("127.0.0.1"),
  MAX_BODY_BYTES: z.number().int().positive().default(1024 * 1024),
});

export const variables = lazilyValidate(
  environmentSchema,
  buildDynamic(environmentSchema),
);
