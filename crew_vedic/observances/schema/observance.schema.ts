import { z } from "zod";

export const ObservanceSchema = z.object({
  name: z.enum(["Ekadashi", "Pradosham", "Amavasya", "Purnima", "Sankashti Chaturthi"]),
  deity: z.string(),
  description: z.string(),
  tags: z.array(z.string()),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  tithi_index: z.number().int().min(1).max(30),
  // true when the triggering tithi never touched a sunrise (kshaya)
  kshaya: z.boolean(),
});

export const ObservanceSetSchema = z.array(ObservanceSchema);

export type Observance = z.infer<typeof ObservanceSchema>;
export type ObservanceSet = z.infer<typeof ObservanceSetSchema>;
