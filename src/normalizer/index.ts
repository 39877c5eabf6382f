/**
 * Normalizer Module
 *
 * Classifies raw lead input into one of two canonical shapes:
 * - BY_CONTACT: a contact (email) address
 * - BY_NAME_ORG: "<first> <last> - <organization>"
 *
 * Usage:
 * const identity = normalize('jane.doe@acme.com');
 */

import { InvalidInputFormatError, toErrorMessage } from '../errors/index.js';
import type { LeadIdentity, LeadId, ModuleResult } from '../types/index.js';

/**
 * Strict contact-address pattern: local-part @ domain with a TLD of 2+ letters
 */
const CONTACT_ADDRESS_PATTERN = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

/**
 * "<name> - <organization>", separator with optional surrounding whitespace.
 * The name group is lazy so the first separator splits the input.
 */
const NAME_ORG_PATTERN = /^(.+?)\s*-\s*(.+)$/;

export const ACCEPTED_FORMATS_MESSAGE =
  'Invalid input format. Use either:\n' +
  '• Email: john.doe@acme.com\n' +
  '• Name + Company: john smith - Nike';

/**
 * Check whether a string is a contact address
 */
export function isContactAddress(value: string): boolean {
  return CONTACT_ADDRESS_PATTERN.test(value);
}

/**
 * Normalize raw lead input
 *
 * @param raw - Raw input from the caller
 * @returns Lead identity with exactly one identification shape populated
 * @throws InvalidInputFormatError when neither shape matches
 */
export function normalize(raw: string): LeadIdentity {
  const input = raw.trim();

  if (input.length === 0) {
    throw new InvalidInputFormatError('Input cannot be empty');
  }

  if (isContactAddress(input)) {
    return {
      input_mode: 'BY_CONTACT',
      contact_address: input,
      person_name: null,
      organization: null,
    };
  }

  const match = NAME_ORG_PATTERN.exec(input);
  if (match) {
    const personName = (match[1] ?? '').trim();
    const organization = (match[2] ?? '').trim();

    if (personName.split(/\s+/).filter(Boolean).length < 2) {
      throw new InvalidInputFormatError(
        "Name should include at least first and last name (e.g., 'john smith - Nike')"
      );
    }

    if (organization.length === 0) {
      throw new InvalidInputFormatError('Company name cannot be empty');
    }

    return {
      input_mode: 'BY_NAME_ORG',
      contact_address: null,
      person_name: personName,
      organization,
    };
  }

  throw new InvalidInputFormatError(ACCEPTED_FORMATS_MESSAGE);
}

/**
 * Normalize without throwing, wrapping the outcome in a ModuleResult
 */
export function normalizeLead(raw: string, leadId: LeadId = ''): ModuleResult<LeadIdentity> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    return {
      success: true,
      data: normalize(raw),
      metadata: { leadId, module: 'normalizer', timestamp, duration: Date.now() - startTime },
    };
  } catch (error) {
    return {
      success: false,
      error: {
        code: error instanceof InvalidInputFormatError ? error.code : 'NORMALIZE_ERROR',
        message: toErrorMessage(error),
      },
      metadata: { leadId, module: 'normalizer', timestamp, duration: Date.now() - startTime },
    };
  }
}

/**
 * Structural check that exactly one identification shape is populated
 */
export function validateLeadIdentity(identity: {
  input_mode: string;
  contact_address: string | null;
  person_name: string | null;
  organization: string | null;
}): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  const hasContact = identity.contact_address !== null;
  const hasNameOrg = identity.person_name !== null || identity.organization !== null;

  if (identity.input_mode === 'BY_CONTACT') {
    if (!hasContact) {
      errors.push('contact_address is required when input_mode is BY_CONTACT');
    }
    if (hasNameOrg) {
      errors.push('person_name and organization must be empty when input_mode is BY_CONTACT');
    }
  } else if (identity.input_mode === 'BY_NAME_ORG') {
    if (identity.person_name === null || identity.organization === null) {
      errors.push('person_name and organization are required when input_mode is BY_NAME_ORG');
    }
    if (hasContact) {
      errors.push('contact_address must be empty when input_mode is BY_NAME_ORG');
    }
  } else {
    errors.push(`Unknown input_mode: ${identity.input_mode}`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Human-readable identifier for a lead
 */
export function getDisplayIdentifier(identity: LeadIdentity): string {
  if (identity.input_mode === 'BY_CONTACT') {
    return identity.contact_address;
  }
  return `${identity.person_name} at ${identity.organization}`;
}

/**
 * Stable key used to derive lead IDs: lowercase address, or name|org
 */
export function deriveIdentityKey(identity: LeadIdentity): string {
  if (identity.input_mode === 'BY_CONTACT') {
    return identity.contact_address.toLowerCase();
  }
  return `${identity.person_name.toLowerCase().replace(/\s+/g, '_')}|${identity.organization.toLowerCase().replace(/\s+/g, '_')}`;
}

/**
 * Organization label derived from the first domain label (acme.com -> Acme)
 */
export function organizationFromAddress(address: string): string | null {
  const domain = address.split('@')[1];
  if (!domain) {
    return null;
  }
  const label = domain.split('.')[0];
  if (!label) {
    return null;
  }
  return label.charAt(0).toUpperCase() + label.slice(1);
}
