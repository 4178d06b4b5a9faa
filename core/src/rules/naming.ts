import pluralize from 'pluralize';

export function contextForResource(resource: string): string {
  return pluralize.plural(resource);
}

export function domainTypeForContext(context: string): string {
  return pluralize.singular(context);
}
