import { z } from 'zod';

export type TelnyxHangupCause = 'CALL_REJECTED' | 'USER_BUSY';

const nonEmpty = z.string().trim().min(1);

export const TelnyxCallPayloadSchema = z
  .object({
    call_control_id: nonEmpty,
    connection_id: z.string().optional(),
    from: z.unknown(),
    to: z.unknown(),
    direction: z.string().optional(),
    hangup_cause: z.string().optional(),
  })
  .passthrough();

export type TelnyxCallPayload = z.infer<typeof TelnyxCallPayloadSchema>;

export const TelnyxWebhookSchema = z.object({
  data: z.object({
    id: z.string().optional(),
    event_type: nonEmpty,
    payload: z.unknown(),
  }),
});

export type TelnyxWebhookPayload = z.infer<typeof TelnyxWebhookSchema>;
