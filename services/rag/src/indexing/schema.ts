import { z } from "zod";
import { MetadataValueSchema, RecordMetadataSchema } from "../store/schema.js";

export const DocumentSchema = z.object({
  content: z.string(),
  metadata: z
    .object({
      filename: z.string().min(1),
      type: z.string().min(1),
    })
    .catchall(MetadataValueSchema),
});

export const ExportedRecordSchema = z.object({
  id: z.string().min(1),
  content: z.string(),
  metadata: RecordMetadataSchema,
});
