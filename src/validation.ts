import AjvModule from 'ajv';
import addFormatsModule from 'ajv-formats';

// Both packages are CommonJS; their default export sits on `.default` under NodeNext.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

export const ajv = new Ajv({ allErrors: true, coerceTypes: true, strict: true });
addFormats(ajv);
