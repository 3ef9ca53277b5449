import { z } from 'zod';
import type { OpenStackConfig } from './index';

export const interfaceSchema = z.enum(['public', 'internal', 'admin']);

const fileConfigSchema = z.object({
  AUTH_URL: z.string().url(),
  USERNAME: z.string().min(1),
  PASSWORD: z.string().min(1),
  PROJECT: z.string().min(1),
  DOMAIN: z.string().min(1).default('Default'),
  PROJECT_DOMAIN: z.string().min(1).optional(),
  REGION: z.string().min(1).default('RegionOne'),
  INTERFACE: interfaceSchema.default('public'),
});

export type Credentials = Omit<OpenStackConfig, 'insecureTls' | 'requestTimeoutMs'>;

/**
 * Validate the JSON config file layout:
 * `{ AUTH_URL, USERNAME, PASSWORD, PROJECT, DOMAIN?, REGION? }`.
 */
export function parseOpenStackFileConfig(raw: unknown, source = 'config file'): Credentials {
  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new Error(`Invalid OpenStack ${source}: ${issues}`);
  }
  const file = parsed.data;
  return {
    authUrl: file.AUTH_URL,
    username: file.USERNAME,
    password: file.PASSWORD,
    projectName: file.PROJECT,
    userDomain: file.DOMAIN,
    projectDomain: file.PROJECT_DOMAIN ?? file.DOMAIN,
    region: file.REGION,
    interface: file.INTERFACE,
  };
}

