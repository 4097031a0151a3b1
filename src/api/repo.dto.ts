import { z } from 'zod';
import { Host, Scm } from '../models/repo.model';
import { hasCloneUrlTemplate } from '../services/clone-url.builder';

const params = z.record(z.string());

export const createRepoSchema = z
    .object({
        host: z.nativeEnum(Host),
        owner: z.string().min(1),
        name: z.string().min(1),
        private: z.boolean().default(false),
        scm: z.nativeEnum(Scm).default(Scm.Git),
        url: z.string().min(1).optional(),
        username: z.string().optional(),
        password: z.string().optional(),
        params: params.optional(),
        timeout: z.number().int().positive().optional(),
        priveleged: z.boolean().optional(),
        team_id: z.string().min(1).optional(),
    })
    .superRefine((body, ctx) => {
        if (!hasCloneUrlTemplate(body.host)) {
            if (!body.url) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['url'],
                    message: `url is required for host ${body.host}`,
                });
            }
            return;
        }
        // Hosted providers get their URL from the template table and are git only.
        if (body.url !== undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['url'],
                message: `url is derived for host ${body.host} and cannot be set`,
            });
        }
        if (body.scm !== Scm.Git) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['scm'],
                message: `host ${body.host} only serves git repositories`,
            });
        }
    });

export type CreateRepoInput = z.infer<typeof createRepoSchema>;

export const updateRepoSchema = z
    .object({
        disabled: z.boolean(),
        disabled_pr: z.boolean(),
        timeout: z.number().int().positive(),
        params,
    })
    .partial()
    .strict();

export type UpdateRepoInput = z.infer<typeof updateRepoSchema>;
