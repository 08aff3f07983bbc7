import {
  BOOLEAN_TYPE,
  INTEGER_TYPE,
  STRING_TYPE,
  Type,
  VOID_TYPE,
  functionType,
} from './types';

/**
 * Signatures of the execution engine's built-in table. List helpers take
 * Integer stand-ins because the checker has no list handles.
 */
export const BUILTIN_SIGNATURES: ReadonlyMap<string, Type> = new Map([
  // I/O
  ['print', functionType([STRING_TYPE], VOID_TYPE)],
  ['println', functionType([STRING_TYPE], VOID_TYPE)],

  // Strings
  ['len', functionType([STRING_TYPE], INTEGER_TYPE)],
  ['substr', functionType([STRING_TYPE, INTEGER_TYPE, INTEGER_TYPE], STRING_TYPE)],
  ['char_at', functionType([STRING_TYPE, INTEGER_TYPE], STRING_TYPE)],
  ['str_concat', functionType([STRING_TYPE, STRING_TYPE], STRING_TYPE)],
  ['str_eq', functionType([STRING_TYPE, STRING_TYPE], BOOLEAN_TYPE)],
  ['str_to_int', functionType([STRING_TYPE], INTEGER_TYPE)],
  ['int_to_str', functionType([INTEGER_TYPE], STRING_TYPE)],
  ['is_digit', functionType([STRING_TYPE], BOOLEAN_TYPE)],
  ['is_alpha', functionType([STRING_TYPE], BOOLEAN_TYPE)],
  ['is_alnum', functionType([STRING_TYPE], BOOLEAN_TYPE)],

  // Lists
  ['list_append', functionType([INTEGER_TYPE, INTEGER_TYPE], INTEGER_TYPE)],
  ['list_get', functionType([INTEGER_TYPE, INTEGER_TYPE], INTEGER_TYPE)],
  ['list_set', functionType([INTEGER_TYPE, INTEGER_TYPE, INTEGER_TYPE], INTEGER_TYPE)],

  // System
  ['exit', functionType([INTEGER_TYPE], VOID_TYPE)],
]);
