export {
  Profile,
  defineProfileModel,
  getProfileSchema,
  PROFILES_ADMIN_API,
  PROFILE_SCHEMA,
  PROFILE_LIST_ADMIN_API,
  PROFILE_LIST_SCHEMA,
  PROFILE_TYPES,
  ProfileType,
  CAN_MANAGE_PROFILE,
} from './profile';
