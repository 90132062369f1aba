/**
 * API role and client the standard setup creates in Jamf Pro.
 */

export interface ApiRoleDefinition {
  displayName: string;
  privileges: string[];
}

export interface ApiClientDefinition {
  displayName: string;
  authorizationScopes: string[];
  enabled: boolean;
  accessTokenLifetimeSeconds: number;
}

export const PATCHER_API_ROLE: Readonly<ApiRoleDefinition> = Object.freeze({
  displayName: 'Patcher-Role',
  privileges: [
    'Read Patch Management Software Titles',
    'Read Patch Policies',
    'Read Mobile Devices',
    'Read Mobile Device Inventory Collection',
    'Read Mobile Device Applications',
    'Read Patch Management Settings',
    'Create API Integrations',
    'Create API Roles',
    'Read API Integrations',
    'Read API Roles',
    'Update API Integrations',
    'Update API Roles',
  ],
});

export const PATCHER_API_CLIENT: Readonly<ApiClientDefinition> = Object.freeze({
  displayName: 'Patcher-Client',
  authorizationScopes: [PATCHER_API_ROLE.displayName],
  enabled: true,
  accessTokenLifetimeSeconds: 1800,
});
