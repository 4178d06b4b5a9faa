export type RecordId = string | number;

export interface Finder {
  find(domainType: string, id: RecordId): Promise<unknown>;
}
