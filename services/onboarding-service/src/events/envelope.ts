import { z } from "zod";

export type EventEnvelope<T> = {
  id: string;
  type: string;
  source: string;
  time: string;
  subject?: string;
  traceId: string;
  parentSpanId?: string;
  data: T;
};

export const eventEnvelopeSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  source: z.string().min(1),
  time: z.string(),
  subject: z.string().optional(),
  traceId: z.string().min(1),
  parentSpanId: z.string().optional(),
  data: z.unknown()
});
