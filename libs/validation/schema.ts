import { z } from 'zod';

/**
 * Configuration document schemas.
 * Secrets never appear here: they come from the environment.
 */

const compilingPattern = (label: string) => z.string().min(1).refine(pattern => {
    try {
        new RegExp(pattern);
        return true;
    } catch {
        return false;
    }
}, { message: `${label} is not a valid regular expression` });

// --- Version control ---

export const GitConfigSchema = z.object({
    remoteUrl: z.string().min(1),
    localDirectory: z.string().min(1),
    branch: z.string().min(1).default('master'),
    remote: z.string().min(1).default('origin'),
});

// --- Audit log ---

const ResourceTypeMapSchema = z.record(z.string().min(1), z.string().min(1));

export const AuditLogConfigSchema = z.object({
    resourceTypes: z.object({
        gcp: ResourceTypeMapSchema.optional(),
        azure: ResourceTypeMapSchema.optional(),
    }).default({}),
    // Log Analytics workspace receiving the subscriptions' activity logs
    azureWorkspaceId: z.string().min(1).optional(),
});

// --- Automation runs ---

export const WorkspaceMappingSchema = z.object({
    org: z.string().min(1),
    workspace: z.array(z.string().min(1)).min(1),
});

export const TerraformConfigSchema = z.object({
    url: z.string().url(),
    serviceWorkspaceMap: z.record(z.string().min(1), WorkspaceMappingSchema),
    workspaceTokenFile: z.string().min(1).optional(),
    runLimit: z.number().int().positive().default(10),
});

// --- Notifiers ---

export const SlackConfigSchema = z.object({
    channelID: z.string().min(1),
    repoCommitURL: z.string().url(),
});

export const JiraConfigSchema = z.object({
    url: z.string().url(),
    projectKey: z.string().min(1),
    issueType: z.string().min(1).default('Task'),
    fields: z.record(z.string(), z.unknown()).default({}),
    filterSet: z.object({
        projectId: compilingPattern('filterSet.projectId'),
    }).optional(),
});

// --- Change processor ---

export const ChangeProcessorConfigSchema = z.object({
    scanInterval: z.number().int().positive(),
    serviceAccountRegex: compilingPattern('serviceAccountRegex'),
    ticketRegex: compilingPattern('ticketRegex').optional(),
    ticketSysUrl: z.string().url().optional(),
    auditLog: AuditLogConfigSchema.default({}),
    terraform: TerraformConfigSchema.optional(),
    slack: SlackConfigSchema.optional(),
    jira: JiraConfigSchema.optional(),
});

export const AttributionConfigSchema = z.object({
    git: GitConfigSchema,
    changeProcessor: ChangeProcessorConfigSchema,
});

export type GitConfig = z.infer<typeof GitConfigSchema>;
export type TerraformConfig = z.infer<typeof TerraformConfigSchema>;
export type SlackConfig = z.infer<typeof SlackConfigSchema>;
export type JiraConfig = z.infer<typeof JiraConfigSchema>;
export type ChangeProcessorConfig = z.infer<typeof ChangeProcessorConfigSchema>;
export type AttributionConfig = z.infer<typeof AttributionConfigSchema>;
