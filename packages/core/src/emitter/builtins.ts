/**
 * Built-in Type Tables
 */

/** Types visible in every file without an import */
export const IMPLICIT_TYPES: ReadonlySet<string> = new Set([
  'Object',
  'String',
  'CharSequence',
  'StringBuilder',
  'StringBuffer',
  'Integer',
  'Long',
  'Short',
  'Byte',
  'Double',
  'Float',
  'Character',
  'Boolean',
  'Number',
  'Void',
  'Math',
  'System',
  'Thread',
  'Runnable',
  'Comparable',
  'Iterable',
  'Cloneable',
  'AutoCloseable',
  'Class',
  'Enum',
  'Throwable',
  'Exception',
  'RuntimeException',
  'Error',
  'IllegalArgumentException',
  'IllegalStateException',
  'NullPointerException',
  'UnsupportedOperationException',
  'IndexOutOfBoundsException',
  'InterruptedException',
]);

/**
 * External interfaces an anonymous class implements rather than extends.
 * Extended through emit options.
 */
export const KNOWN_INTERFACES: ReadonlySet<string> = new Set([
  'Runnable',
  'Comparable',
  'Iterable',
  'CharSequence',
  'AutoCloseable',
  'Cloneable',
  'Comparator',
  'Iterator',
  'Callable',
  'Supplier',
  'Consumer',
  'Function',
  'Predicate',
  'BiFunction',
  'BiConsumer',
  'UnaryOperator',
]);

/** Source types written as TypeScript built-ins */
export const TYPE_MAPPING: Readonly<Record<string, string>> = {
  byte: 'number',
  short: 'number',
  int: 'number',
  long: 'number',
  float: 'number',
  double: 'number',
  Byte: 'number',
  Short: 'number',
  Integer: 'number',
  Long: 'number',
  Float: 'number',
  Double: 'number',
  Number: 'number',
  char: 'string',
  Character: 'string',
  String: 'string',
  boolean: 'boolean',
  Boolean: 'boolean',
  Object: 'unknown',
  Void: 'void',
};

/** Prefix dropped before looking a qualified name up in TYPE_MAPPING */
export const IMPLICIT_PACKAGE = 'java.lang.';
