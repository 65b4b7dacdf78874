import type { JsonObject, JsonValue } from '../types/index.js'

/**
 * Check if a JSON value is an object node
 */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Flatten a schema document into searchable text.
 *
 * For each object node this emits the names under `properties`, the node's own
 * `description`, then walks its values in key order: nested objects recurse and
 * string scalars are emitted verbatim. Arrays and other scalars add nothing.
 * Every emitted piece is followed by a single space.
 *
 * @example
 * extractSchemaText({ properties: { path: {} }, description: 'x' })
 * // => 'path x x '
 */
export function extractSchemaText(schema: JsonValue | undefined): string {
  if (!isJsonObject(schema)) {
    return ''
  }

  let text = ''

  const properties = schema.properties
  if (isJsonObject(properties)) {
    for (const key of Object.keys(properties)) {
      text += `${key} `
    }
  }

  const description = schema.description
  if (typeof description === 'string') {
    text += `${description} `
  }

  for (const value of Object.values(schema)) {
    if (isJsonObject(value)) {
      text += extractSchemaText(value)
    }
    else if (typeof value === 'string') {
      text += `${value} `
    }
  }

  return text
}

/**
 * Convert arbitrary transport data into a JSON value tree.
 * Returns undefined for values JSON cannot represent.
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined
  }

  if (Array.isArray(value)) {
    const items: JsonValue[] = []
    for (const item of value) {
      // JSON.stringify writes unrepresentable array items as null
      items.push(toJsonValue(item) ?? null)
    }
    return items
  }

  if (typeof value === 'object') {
    const node: JsonObject = {}
    for (const [key, child] of Object.entries(value)) {
      const converted = toJsonValue(child)
      if (converted !== undefined) {
        node[key] = converted
      }
    }
    return node
  }

  return undefined
}

/**
 * Convert arbitrary transport data into a JSON object, or undefined if it is not one
 */
export function toJsonObject(value: unknown): JsonObject | undefined {
  const converted = toJsonValue(value)
  return isJsonObject(converted) ? converted : undefined
}
