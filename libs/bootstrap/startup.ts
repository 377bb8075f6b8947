import { logger } from "../logging/logger.js";
import { ConfigGuard, type Environment } from "./config-guard.js";
import {
    credentialRequirements,
    ENV_AZURE_LOG_WORKSPACE_ID,
    ENV_JIRA_PASSWORD,
    ENV_JIRA_USER,
    ENV_SLACK_TOKEN
} from "./config/credentials-config.js";
import type { AttributionConfig, ChangeProcessorConfig } from "../validation/schema.js";
import { ChangeAttributor } from "../attribution/changeAttributor.js";
import { ChangerClassifier } from "../attribution/classifier.js";
import { createTicketExtractor } from "../attribution/ticketExtractor.js";
import { AuditLogCorrelator } from "../audit/correlator.js";
import type { AuditLogSource } from "../audit/auditLogSource.js";
import { ResourceTypeRegistry } from "../audit/resourceRegistry.js";
import { GcpAuditLogSource, createLogEntriesLister, type LogEntriesLister } from "../audit/gcpAuditLogSource.js";
import {
    AzureActivityLogSource,
    createWorkspaceLogsQuerier,
    type WorkspaceLogsQuerier
} from "../audit/azureActivityLogSource.js";
import { AutomationRunCorrelator, tokenClientFactory } from "../automation/runCorrelator.js";
import type { TerraformApi } from "../automation/terraformClient.js";
import { ENV_TERRAFORM_TOKEN_FILE, loadOrgTokens } from "../automation/tokens.js";
import { NotificationDispatcher, type Notifier } from "../notify/notifier.js";
import { SlackNotifier, createSlackUploader, type SlackFileUploader } from "../notify/slackNotifier.js";
import { JiraNotifier } from "../notify/jiraNotifier.js";
import { GitRepository, type GitRunner } from "../vcs/gitRepository.js";

/**
 * Replacement clients, used where the real upstream is not wanted.
 */
export interface ClientOverrides {
    readonly gcpLogEntries?: LogEntriesLister;
    readonly azureLogs?: WorkspaceLogsQuerier;
    readonly slackUploader?: SlackFileUploader;
    readonly terraformClientFor?: (organization: string) => TerraformApi;
    readonly git?: GitRunner;
}

export interface AttributionRuntime {
    readonly repo: GitRepository;
    readonly attributor: ChangeAttributor;
    readonly scanIntervalMinutes: number;
}

/**
 * Checks credentials and wires every collaborator the configuration names.
 */
export async function bootstrap(
    serviceName: string,
    config: AttributionConfig,
    env: Environment = process.env,
    overrides: ClientOverrides = {}
): Promise<AttributionRuntime> {
    logger.info({ serviceName }, "Bootstrapping service");

    const processor = config.changeProcessor;
    ConfigGuard.enforce(credentialRequirements(processor), env);

    const repo = new GitRepository({
        directory: config.git.localDirectory,
        remoteUrl: config.git.remoteUrl,
        branch: config.git.branch,
        remote: config.git.remote
    }, overrides.git);
    await repo.setup();

    const auditLog = new AuditLogCorrelator(
        auditLogSources(processor, env, overrides),
        new ResourceTypeRegistry(processor.auditLog.resourceTypes)
    );

    const automationRuns = await automationRunCorrelator(processor, env, overrides);
    if (!automationRuns) {
        logger.info("No terraform configuration found. Skipping run lookups for additional info");
    }

    const attributor = new ChangeAttributor({
        repo,
        auditLog,
        classifier: new ChangerClassifier(processor.serviceAccountRegex),
        scanIntervalMinutes: processor.scanInterval,
        automationRuns,
        tickets: createTicketExtractor(processor.ticketRegex, processor.ticketSysUrl),
        notifications: new NotificationDispatcher(notifiers(config, env, overrides))
    });

    logger.info({ serviceName }, "Startup checks passed");
    return { repo, attributor, scanIntervalMinutes: processor.scanInterval };
}

function auditLogSources(
    processor: ChangeProcessorConfig,
    env: Environment,
    overrides: ClientOverrides
): AuditLogSource[] {
    const sources: AuditLogSource[] = [
        new GcpAuditLogSource(overrides.gcpLogEntries ?? createLogEntriesLister())
    ];

    const workspaceId = processor.auditLog.azureWorkspaceId ?? env[ENV_AZURE_LOG_WORKSPACE_ID];
    if (workspaceId) {
        sources.push(new AzureActivityLogSource(workspaceId, overrides.azureLogs ?? createWorkspaceLogsQuerier()));
    } else {
        logger.info("No Azure log workspace configured. Azure changes will not be attributed");
    }
    return sources;
}

async function automationRunCorrelator(
    processor: ChangeProcessorConfig,
    env: Environment,
    overrides: ClientOverrides
): Promise<AutomationRunCorrelator | null> {
    const terraform = processor.terraform;
    if (!terraform) {
        return null;
    }

    let clientFor = overrides.terraformClientFor;
    if (!clientFor) {
        const tokenFile = terraform.workspaceTokenFile ?? env[ENV_TERRAFORM_TOKEN_FILE] ?? '';
        clientFor = tokenClientFactory(terraform.url, await loadOrgTokens(tokenFile));
    }

    return new AutomationRunCorrelator({
        baseUrl: terraform.url,
        serviceWorkspaceMap: terraform.serviceWorkspaceMap,
        clientFor,
        defaultWindowMinutes: processor.scanInterval,
        runLimit: terraform.runLimit
    });
}

function notifiers(config: AttributionConfig, env: Environment, overrides: ClientOverrides): Notifier[] {
    const processor = config.changeProcessor;
    const result: Notifier[] = [];

    if (processor.slack) {
        result.push(new SlackNotifier(
            {
                channelId: processor.slack.channelID,
                repoCommitUrl: processor.slack.repoCommitURL,
                branch: config.git.branch
            },
            overrides.slackUploader ?? createSlackUploader(env[ENV_SLACK_TOKEN] ?? '')
        ));
    }

    if (processor.jira) {
        result.push(new JiraNotifier({
            url: processor.jira.url,
            projectKey: processor.jira.projectKey,
            username: env[ENV_JIRA_USER] ?? '',
            password: env[ENV_JIRA_PASSWORD] ?? '',
            issueType: processor.jira.issueType,
            fields: processor.jira.fields,
            projectIdFilter: processor.jira.filterSet?.projectId
        }));
    }

    return result;
}
