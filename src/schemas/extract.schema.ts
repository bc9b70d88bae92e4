import { z } from "zod";

export const ExtractBody = z.object({
  text: z.string().trim().min(1, "text is required"),
});

export type ExtractBody = z.infer<typeof ExtractBody>;

// A TaskRecord as the client sends it back (e.g. after editing)
export const TaskRecordBody = z.object({
  task: z.string(),
  with_whom: z.string().optional(),
  time: z.string(),
  location: z.string().optional(),
  agenda: z.string().optional(),
  duration: z.string().optional(),
  participants: z.union([z.array(z.string()), z.string()]).optional(),
});

export const IcsBody = z.object({ records: z.array(TaskRecordBody).min(1) });
