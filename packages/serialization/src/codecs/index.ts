export {
  CoercionRegistry,
  createCoercionRegistry,
  type Coercion,
  type CoercionTable,
  type CoercionTypeMap,
  type CoercionTypeName
} from './registry.js';
export {
  createDefaultCoercions,
  dateTimeCoercion,
  enumCoercion,
  enumMembers,
  hexCoercion,
  isEnumMember,
  type EnumLike
} from './coercions.js';
