import { z } from 'zod';

export const notifyChannelSchema = z.enum(['webhook', 'google-chat']);
export type NotifyChannel = z.infer<typeof notifyChannelSchema>;

export const httpUrlSchema = z
  .string()
  .url()
  .refine((val) => {
    try {
      const url = new URL(val);
      return url.protocol === 'http:' || url.protocol === 'https:';
    } catch {
      return false;
    }
  }, 'url protocol must be http or https');

export const notifyHeadersJsonSchema = z.record(z.string());

// Strings inside the template may reference {{path}} variables or $MSG.
export const notifyPayloadTemplateSchema = z.union([
  z.record(z.unknown()),
  z.array(z.unknown()),
]);

export const flagsNamespaceSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9._-]+$/, 'namespace may only contain letters, digits, ".", "_" and "-"');
