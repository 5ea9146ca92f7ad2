import { defineModel, DefinedModel, ModelOptions } from '../model';
import { Schema } from '../types';
import profileFields from './profile-schema.json';

export const PROFILES_ADMIN_API = 'Profile Admin API';
export const PROFILE_SCHEMA = 'Profile Schema';

export const PROFILE_LIST_ADMIN_API = 'Profile List Admin API';
export const PROFILE_LIST_SCHEMA = 'Profile List Schema';

export const PROFILE_TYPES = [
  'personal',
  'business',
  'reseller',
  'referral',
  'affinity',
  'dssupplier',
  'supplier',
  'mashup',
] as const;

export type ProfileType = (typeof PROFILE_TYPES)[number];

export const CAN_MANAGE_PROFILE = 'can_manage_profile';

/**
 * Field definitions of a profile document
 */
export function getProfileSchema(): Schema {
  return structuredClone(profileFields);
}

/**
 * Profiles are stored per entity under `/{entity_id}/Profile Admin API`.
 * The schema points at the shared profile schema document.
 */
export function defineProfileModel(options: Partial<Pick<ModelOptions, 'client' | 'manager' | 'managerClass'>> = {}): DefinedModel {
  return defineModel({
    name: 'Profile',
    indexTemplate: `/{entity_id}/${PROFILES_ADMIN_API}`,
    schema: {
      _foreign: `.schema/${PROFILE_SCHEMA}`,
      ...getProfileSchema(),
    },
    ...options,
  });
}

export const Profile = defineProfileModel();
