import { z } from 'zod';

export const DEFAULT_CATEGORY = 'uncategorized';

export const KeyActionSchema = z.enum([
  'quit',
  'add',
  'edit',
  'delete',
  'toggle',
  'save',
  'move_up',
  'move_down',
  'category_prev',
  'category_next',
  'help',
  'reload',
]);
export type KeyAction = z.infer<typeof KeyActionSchema>;

export const TodoItemSchema = z.object({
  id: z.number().int(),
  text: z.string().min(1),
  done: z.boolean(),
  category: z.string().min(1),
});
export type TodoItem = z.infer<typeof TodoItemSchema>;
