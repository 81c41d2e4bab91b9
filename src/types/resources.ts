export const RESOURCE_NAMES = ['database_schema', 'tables', 'query_templates'] as const;

export type ResourceName = (typeof RESOURCE_NAMES)[number];

export interface ResourceDescriptor {
  name: ResourceName;
  uri: string;
  title: string;
  description: string;
  mimeType: 'application/json';
}

export interface ResourceContent {
  uri: string;
  mimeType: string;
  text: string;
}
