import { z } from 'zod';

import { KERNELSPEC_DEFAULTS } from '../config/defaults';

const bareCommand = z
  .string()
  .min(1)
  .refine((value) => !/[\\/]/.test(value), { message: 'must be a bare command name, not a path' });

export const kernelIdentitySchema = z.object({
  kernelName: z
    .string()
    .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'may only contain letters, digits, ".", "_" and "-"'),
  displayName: z.string().min(1),
  friendlyName: z.string().min(1),
  languageName: z.string().min(1),
  kernelVersion: z.string().min(1),
  description: z.string(),
  executable: bareCommand.optional(),
  developScript: z.string().min(1).optional()
});

export type KernelIdentityInput = z.input<typeof kernelIdentitySchema>;

/**
 * Static description of a kernel, supplied once by the embedding kernel author.
 */
export interface KernelIdentity {
  /** Process-unique slug; also the name the host registers the kernel under. */
  readonly kernelName: string;
  readonly displayName: string;
  /** Human-facing name used in notices ("the Echo kernel"). */
  readonly friendlyName: string;
  readonly languageName: string;
  readonly kernelVersion: string;
  readonly description: string;
  /** Command invoked by installed-mode specs. */
  readonly executable: string;
  /** npm script re-invoked by development-mode specs. */
  readonly developScript: string;
}

export function defineKernelIdentity(input: KernelIdentityInput): KernelIdentity {
  const parsed = kernelIdentitySchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'identity'} ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid kernel identity: ${details}`);
  }

  const { executable, developScript, ...rest } = parsed.data;
  return Object.freeze({
    ...rest,
    executable: executable ?? rest.kernelName,
    developScript: developScript ?? KERNELSPEC_DEFAULTS.DEVELOP_SCRIPT
  });
}
