import type { Provider } from '../change/change.js';

/**
 * Snapshot resource name -> audit-log resource type, per provider.
 *
 * GCP values are Cloud Logging monitored-resource types; Azure values are the
 * resource-provider prefix of the activity-log operation name.
 */
export type ResourceTypeTable = Readonly<Record<Provider, Readonly<Record<string, string>>>>;

export const DEFAULT_RESOURCE_TYPES: ResourceTypeTable = {
    gcp: {
        networks: 'gce_network',
        subnetworks: 'gce_subnetwork',
        privateServicesAccessRanges: 'gce_reserved_address',
        firewalls: 'gce_firewall_rule',
        routes: 'gce_route',
        vpnTunnels: 'vpn_tunnel',
        k8s: 'gke_cluster'
    },
    azure: {
        aksClusters: 'Microsoft.ContainerService/managedClusters',
        applicationSecurityGroups: 'Microsoft.Network/applicationSecurityGroups',
        networkInterfaces: 'Microsoft.Network/networkInterfaces',
        networkSecurityGroups: 'Microsoft.Network/networkSecurityGroups',
        resourceGroups: 'Microsoft.Resources/resourceGroups',
        virtualNetworks: 'Microsoft.Network/virtualNetworks',
        vnetGateways: 'Microsoft.Network/virtualNetworkGateways'
    }
};

export class ResourceTypeRegistry {
    private readonly table: ResourceTypeTable;

    constructor(overrides: Partial<Record<Provider, Record<string, string>>> = {}) {
        this.table = {
            gcp: { ...DEFAULT_RESOURCE_TYPES.gcp, ...overrides.gcp },
            azure: { ...DEFAULT_RESOURCE_TYPES.azure, ...overrides.azure }
        };
    }

    logResourceType(provider: Provider, resourceType: string): string | undefined {
        const types = this.table[provider];
        return Object.prototype.hasOwnProperty.call(types, resourceType) ? types[resourceType] : undefined;
    }
}
