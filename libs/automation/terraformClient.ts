import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';

const JSON_API = 'application/vnd.api+json';

/**
 * Terraform Cloud/Enterprise API calls the run correlator needs.
 */
export interface TerraformApi {
    /** @returns the workspace id */
    showWorkspace(organization: string, workspaceName: string): Promise<string>;
    /** @returns the raw `runs` list document */
    listRuns(workspaceId: string, pageSize: number): Promise<unknown>;
}

const WorkspaceShowSchema = z.object({
    data: z.object({ id: z.string().min(1) })
});

export class TerraformHttpClient implements TerraformApi {
    private readonly http: AxiosInstance;

    constructor(baseUrl: string, token: string, http?: AxiosInstance) {
        this.http = http ?? axios.create({
            baseURL: `${baseUrl.replace(/\/+$/, '')}/api/v2`,
            headers: {
                'Authorization': `Bearer ${token}`,
                'Content-Type': JSON_API,
                'Accept': JSON_API
            }
        });
    }

    public async showWorkspace(organization: string, workspaceName: string): Promise<string> {
        const { data } = await this.http.get<unknown>(
            `/organizations/${encodeURIComponent(organization)}/workspaces/${encodeURIComponent(workspaceName)}`
        );
        return WorkspaceShowSchema.parse(data).data.id;
    }

    public async listRuns(workspaceId: string, pageSize: number): Promise<unknown> {
        const { data } = await this.http.get<unknown>(
            `/workspaces/${encodeURIComponent(workspaceId)}/runs`,
            { params: { 'page[size]': pageSize, include: 'created_by' } }
        );
        return data;
    }
}
