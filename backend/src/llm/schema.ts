import { z } from "zod";

// Entries stay loose here: only "is it an object" is checked, the fields are
// read defensively when the entry is shaped.
export const rawAnswerSchema = z.record(z.string(), z.unknown());

export const answerListSchema = z.array(rawAnswerSchema);

export const responseSchema = z.union([
  answerListSchema,
  z.object({ answers: answerListSchema }).passthrough(),
]);

export type RawAnswer = z.infer<typeof rawAnswerSchema>;
