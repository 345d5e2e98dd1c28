import { z } from 'zod';
import { LazyStringSchema } from './lazy.schema.js';

export const ConditionSchema = z.union([
  z.literal('always'),
  z.literal('never'),
  z.object({ execute: z.string().trim().min(1) }).strict(),
  z.object({ command: z.string().min(1), args: z.array(z.string()).default([]) }).strict(),
]);

export const ModuleSpecSchema = z.object({ type: z.string().min(1) }).passthrough();

export const TaskSpecSchema = z.object({
  description: z.string().min(1),
  module: ModuleSpecSchema,
  when: ConditionSchema.default('always'),
});

export const PlaybookFileSchema = z.object({
  name: z.string().min(1).optional(),
  vars: z.record(z.string()).default({}),
  tasks: z.array(TaskSpecSchema).min(1),
});

export const NullModuleSchema = z.object({ type: z.literal('null') }).strict();

export const CommandModuleSchema = z
  .object({
    type: z.literal('command'),
    command: LazyStringSchema,
    args: z.array(LazyStringSchema).default([]),
    creates: LazyStringSchema.optional(),
    removes: LazyStringSchema.optional(),
  })
  .strict();

export const StackTemplateSchema = z.union([
  z.object({ body: LazyStringSchema }).strict(),
  z.object({ url: LazyStringSchema }).strict(),
  z.object({ file: z.string().min(1) }).strict(),
]);

export const CloudFormationModuleSchema = z
  .object({
    type: z.literal('cloudformation'),
    stackName: LazyStringSchema,
    template: StackTemplateSchema,
  })
  .strict();

export type ConditionSpec = z.infer<typeof ConditionSchema>;
export type TaskSpec = z.infer<typeof TaskSpecSchema>;
export type PlaybookFile = z.infer<typeof PlaybookFileSchema>;
export type CommandModuleSpec = z.infer<typeof CommandModuleSchema>;
export type CloudFormationModuleSpec = z.infer<typeof CloudFormationModuleSchema>;
