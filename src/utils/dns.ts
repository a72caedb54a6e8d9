/**
 * Private DNS zones used by Azure private endpoints
 */

const PRIVATE_DNS_ZONES: Record<string, string[]> = {
  'Azure Automation': ['azure-automation.net'],
  'Azure Monitor': [
    'agentsvc.azure-automation.net',
    'blob.core.windows.net',
    'monitor.azure.com',
    'ods.opinsights.azure.com',
    'oms.opinsights.azure.com',
  ],
  'Azure SQL': ['database.windows.net'],
  'Azure Database for PostgreSQL': ['postgres.database.azure.com'],
  'Key vault': ['vaultcore.azure.net'],
  'Storage account': ['blob.core.windows.net', 'file.core.windows.net', 'queue.core.windows.net'],
};

/**
 * Zones for one resource type, or the sorted union of every zone
 */
export function orderedPrivateDnsZones(resourceType?: string): string[] {
  const zones = resourceType
    ? PRIVATE_DNS_ZONES[resourceType] ?? []
    : Object.values(PRIVATE_DNS_ZONES).flat();
  return [...new Set(zones.map((zone) => `privatelink.${zone}`))].sort();
}
