// Access control: a closed role set and the capabilities each role holds.

import {Either, Left, Right} from 'purify-ts';
import type {Capability, Role} from '../domain';
import {invalidInput, OrderError} from './errors';

export const ROLES: readonly Role[] = ['customer', 'staff', 'admin'];

const capabilities: Record<Role, readonly Capability[]> = {
  customer: [],
  staff: ['manage_catalog', 'export_report', 'confirm_delivery', 'read_feedback'],
  admin: [
    'manage_catalog',
    'export_report',
    'confirm_delivery',
    'set_fees',
    'set_discounts',
    'assign_courier',
    'cancel_order',
    'set_role',
    'record_treasury',
    'read_feedback',
  ],
};

export function parseRole(value: string): Either<OrderError, Role> {
  const role = ROLES.find(r => r === value.trim().toLowerCase());
  return role ? Right(role) : Left(invalidInput('role', `expected one of ${ROLES.join(', ')}`));
}

/**
 * The owner is always an admin, whatever the stored role says.
 */
export function resolveRole(stored: Role | null, userId: string, ownerId: string | null): Role {
  if (ownerId !== null && ownerId !== '' && userId === ownerId) return 'admin';
  return stored ?? 'customer';
}

export function can(role: Role, capability: Capability): boolean {
  return capabilities[role].includes(capability);
}
