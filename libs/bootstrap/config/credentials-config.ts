import { ENV_TERRAFORM_TOKEN_FILE } from '../../automation/tokens.js';
import type { ChangeProcessorConfig } from '../../validation/schema.js';
import type { GuardRule } from '../config-guard.js';

export const ENV_SLACK_TOKEN = 'SLACK_TOKEN';
export const ENV_JIRA_USER = 'JIRA_USR';
export const ENV_JIRA_PASSWORD = 'JIRA_PSW';
export const ENV_AZURE_LOG_WORKSPACE_ID = 'AZURE_LOG_WORKSPACE_ID';

/**
 * Credentials each configured collaborator needs from the environment.
 * Sections that are not configured need nothing.
 */
export function credentialRequirements(config: ChangeProcessorConfig): GuardRule[] {
    const rules: GuardRule[] = [];

    if (config.slack) {
        rules.push({ type: 'required', name: ENV_SLACK_TOKEN });
    }

    if (config.jira) {
        rules.push({ type: 'required', name: ENV_JIRA_USER });
        rules.push({ type: 'required', name: ENV_JIRA_PASSWORD });
    }

    const terraform = config.terraform;
    if (terraform) {
        rules.push({
            type: 'assert',
            check: env => !!terraform.workspaceTokenFile || !!env[ENV_TERRAFORM_TOKEN_FILE],
            message: `terraform section needs workspaceTokenFile or env var ${ENV_TERRAFORM_TOKEN_FILE}`,
        });
    }

    return rules;
}
