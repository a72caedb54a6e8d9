/**
 * Networking constants shared by the SHM and SRE programs
 */

/** NSG rule priorities; lower numbers are evaluated first */
export const NetworkingPriorities = {
  AZURE_GATEWAY_MANAGER: 100,
  AZURE_LOAD_BALANCER: 200,
  AZURE_PLATFORM_DNS: 300,
  AZURE_CLOUD: 400,
  INTERNAL_SELF: 1000,
  INTERNAL_VIRTUAL_NETWORK: 1050,
  INTERNAL_SRE_APPLICATION_GATEWAY: 1100,
  INTERNAL_SRE_DATA_PRIVATE: 1200,
  INTERNAL_SRE_GUACAMOLE_CONTAINERS: 1300,
  INTERNAL_SRE_IDENTITY_CONTAINERS: 1400,
  INTERNAL_SRE_TRAFFIC_FILTER: 1500,
  INTERNAL_SRE_USER_SERVICES_DATABASES: 1600,
  INTERNAL_SRE_USER_SERVICES_SOFTWARE_REPOSITORIES: 1700,
  INTERNAL_SRE_WORKSPACES: 1800,
  AUTHORISED_EXTERNAL_ADMIN_IPS: 3000,
  AUTHORISED_EXTERNAL_USER_IPS: 3100,
  EXTERNAL_INTERNET: 3999,
  ALL_OTHER: 4096,
} as const;

export const Ports = {
  AZURE_BASTION_DATA_PLANE: '8080',
  AZURE_BASTION_HOST_COMMUNICATION: '5701',
  DNS: '53',
  HTTP: '80',
  HTTPS: '443',
  LDAP: '389',
  LDAPS: '636',
  MSSQL: '1433',
  POSTGRESQL: '5432',
  RDP: '3389',
  SQUID: '3128',
  SSH: '22',
} as const;

/** Azure's virtual public IP for platform DNS and health probes */
export const AZURE_PLATFORM_IP = '168.63.129.16';
