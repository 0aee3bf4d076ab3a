/**
 * Schema Validator - JSON schema subset used for workflow files
 */

export interface ValidationError {
    path: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationError[];
}

export type JsonType = 'object' | 'array' | 'string' | 'number' | 'boolean' | 'null';

export interface JsonSchema {
    /** One type, or a list of accepted types */
    type?: JsonType | JsonType[];
    properties?: Record<string, JsonSchema>;
    /** Schema for keys not listed in `properties`; `false` rejects them */
    additionalProperties?: JsonSchema | false;
    required?: string[];
    items?: JsonSchema;
    minItems?: number;
    minLength?: number;
    enum?: unknown[];
    pattern?: string;
    minimum?: number;
    maximum?: number;
    integer?: boolean;
}

export class SchemaValidator {
    private schemas: Map<string, JsonSchema> = new Map();

    registerSchema(schemaId: string, schema: JsonSchema): void {
        this.schemas.set(schemaId, schema);
    }

    validate(value: unknown, schemaId: string): ValidationResult {
        const schema = this.schemas.get(schemaId);
        if (!schema) {
            return {
                valid: false,
                errors: [{ path: '', message: `Schema not found: ${schemaId}` }],
            };
        }

        const errors: ValidationError[] = [];
        this.validateValue(value, schema, '', errors);

        return {
            valid: errors.length === 0,
            errors,
        };
    }

    private validateValue(
        value: unknown,
        schema: JsonSchema,
        path: string,
        errors: ValidationError[]
    ): void {
        // Type validation
        const actualType = this.getType(value);
        if (schema.type) {
            const accepted = Array.isArray(schema.type) ? schema.type : [schema.type];
            if (!accepted.includes(actualType)) {
                errors.push({
                    path,
                    message: `Expected type ${accepted.join(' | ')}, got ${actualType}`,
                });
                return;
            }
        }

        // Object validation
        if (this.isRecord(value)) {
            if (schema.required) {
                for (const req of schema.required) {
                    if (!(req in value)) {
                        errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                    }
                }
            }

            const known = schema.properties ?? {};
            for (const [key, child] of Object.entries(value)) {
                const propSchema = known[key];
                if (propSchema) {
                    this.validateValue(child, propSchema, `${path}.${key}`, errors);
                } else if (schema.additionalProperties === false) {
                    errors.push({ path: `${path}.${key}`, message: 'Unknown field' });
                } else if (schema.additionalProperties) {
                    this.validateValue(child, schema.additionalProperties, `${path}.${key}`, errors);
                }
            }
        }

        // Array validation
        if (Array.isArray(value)) {
            if (schema.minItems !== undefined && value.length < schema.minItems) {
                errors.push({ path, message: `Expected at least ${schema.minItems} item(s), got ${value.length}` });
            }
            if (schema.items) {
                for (let i = 0; i < value.length; i++) {
                    this.validateValue(value[i], schema.items, `${path}[${i}]`, errors);
                }
            }
        }

        // Enum validation
        if (schema.enum && !schema.enum.includes(value)) {
            errors.push({
                path,
                message: `Value must be one of: ${schema.enum.join(', ')}`,
            });
        }

        if (typeof value === 'string') {
            if (schema.minLength !== undefined && value.length < schema.minLength) {
                errors.push({ path, message: `String shorter than ${schema.minLength}` });
            }
            if (schema.pattern) {
                const regex = new RegExp(schema.pattern);
                if (!regex.test(value)) {
                    errors.push({ path, message: `Value does not match pattern: ${schema.pattern}` });
                }
            }
        }

        // Number range validation
        if (typeof value === 'number') {
            if (schema.integer && !Number.isInteger(value)) {
                errors.push({ path, message: `Value ${value} is not an integer` });
            }
            if (schema.minimum !== undefined && value < schema.minimum) {
                errors.push({ path, message: `Value ${value} < minimum ${schema.minimum}` });
            }
            if (schema.maximum !== undefined && value > schema.maximum) {
                errors.push({ path, message: `Value ${value} > maximum ${schema.maximum}` });
            }
        }
    }

    private isRecord(value: unknown): value is Record<string, unknown> {
        return typeof value === 'object' && value !== null && !Array.isArray(value);
    }

    private getType(value: unknown): JsonType {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        switch (typeof value) {
            case 'string': return 'string';
            case 'number': return 'number';
            case 'boolean': return 'boolean';
            case 'object': return 'object';
            // undefined, function, symbol, bigint never come out of JSON.parse
            default: return 'null';
        }
    }
}
