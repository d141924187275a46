import { z } from 'zod';
import { defineJob } from '@typed-jobs/core';

export const SendEmail = defineJob({
  name: 'SendEmail',
  args: z.object({
    to: z.string().email(),
    subject: z.string(),
    retries: z.number().int().default(2),
    tags: z.array(z.string()).default(() => ['mail'])
  }),
  run: (ctx) => `sent ${ctx.get('subject')} to ${ctx.get('to')}`
});

export const Ping = defineJob({
  name: 'Ping',
  run: () => 'pong'
});
