/**
 * Company filtering
 */

import type { CompanyFilter, WorkRecord } from '../../types/index.js';

// Label that selects records without a company
export const OTHER_COMPANY_LABEL = 'Other';

export const ANY_COMPANY: CompanyFilter = { kind: 'any' };

/**
 * Map the user-facing selector to a filter: nothing selects every record,
 * "Other" selects records with an empty company, anything else is an exact name.
 */
export function parseCompanyFilter(input: string | null | undefined): CompanyFilter {
  if (input === undefined || input === null) {
    return ANY_COMPANY;
  }
  if (input === OTHER_COMPANY_LABEL) {
    return { kind: 'unassigned' };
  }
  return { kind: 'named', name: input };
}

export function matchesCompany(record: WorkRecord, filter: CompanyFilter): boolean {
  switch (filter.kind) {
    case 'any':
      return true;
    case 'named':
      return record.companyName === filter.name;
    case 'unassigned':
      return record.companyName === '';
  }
}

export function filterByCompany(
  records: readonly WorkRecord[],
  filter: CompanyFilter
): WorkRecord[] {
  if (filter.kind === 'any') {
    return [...records];
  }
  return records.filter((record) => matchesCompany(record, filter));
}

/**
 * Label for result payloads; null when unfiltered
 */
export function describeCompanyFilter(filter: CompanyFilter): string | null {
  switch (filter.kind) {
    case 'any':
      return null;
    case 'named':
      return filter.name;
    case 'unassigned':
      return OTHER_COMPANY_LABEL;
  }
}

/**
 * Distinct company categories present in the records, sorted.
 * Includes "Other" when any record has no company.
 */
export function listCompanyCategories(records: readonly WorkRecord[]): string[] {
  const companies = new Set<string>();
  for (const record of records) {
    companies.add(record.companyName === '' ? OTHER_COMPANY_LABEL : record.companyName);
  }
  return Array.from(companies).sort();
}
