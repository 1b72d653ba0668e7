export const HTTP_API_METADATA = Symbol.for("nimbus:http-api");
export const FUNCTION_CONFIG_METADATA = Symbol.for("nimbus:function-config");
export const ENTITY_METADATA = Symbol.for("nimbus:entity");
export const PARTITION_KEY_METADATA = Symbol.for("nimbus:partition-key");
export const SORT_KEY_METADATA = Symbol.for("nimbus:sort-key");
export const FIELD_METADATA = Symbol.for("nimbus:fields");
export const INJECTABLE_METADATA = Symbol.for("nimbus:injectable");
export const INJECT_METADATA = Symbol.for("nimbus:inject");
