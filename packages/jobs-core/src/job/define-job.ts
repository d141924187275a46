import type { z } from 'zod';
import { JobPipeline, type JobPipelineOptions } from './job-pipeline';
import type { JobDefinition } from './job.types';

/**
 * Declare a job: an optional zod object schema for its arguments and a body.
 *
 * @example
 * ```ts
 * export const ResizeImage = defineJob({
 *   name: 'ResizeImage',
 *   args: z.object({ imageId: z.string().uuid(), width: z.number().int().default(640) }),
 *   run: async (ctx) => resize(ctx.get('imageId'), ctx.get('width'))
 * });
 *
 * await ResizeImage.submit({ imageId });
 * ```
 */
export function defineJob<TSchema extends z.ZodTypeAny | undefined = undefined, TResult = unknown>(
  definition: JobDefinition<TSchema, TResult>,
  options?: JobPipelineOptions
): JobPipeline<TSchema, TResult> {
  return new JobPipeline(definition, options);
}
