/**
 * Admin user schema.
 *
 * Published through the schema registry only; no route checks it.
 */

import { z } from 'zod';
import { adminRoleSchema } from './common.js';

export const AdminUserSchema = z.object({
  email: z.string(),
  role: adminRoleSchema.default('admin'),
});

export type AdminUser = z.infer<typeof AdminUserSchema>;
