import { z } from "zod";

export const MetadataValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const RecordMetadataSchema = z.record(z.string(), MetadataValueSchema);
