/**
 * Human-readable rendering of feed errors for the command line
 */

const hasMessage = (error: object): error is { readonly message: string } =>
  "message" in error && typeof error.message === "string"

/**
 * Format an error by its tag
 */
export const formatError = (error: unknown): string => {
  if (typeof error === "string") {
    return error
  }

  if (error === null || typeof error !== "object") {
    return "Unknown error"
  }

  const message = hasMessage(error) ? error.message : JSON.stringify(error)
  const tag = "_tag" in error && typeof error._tag === "string" ? error._tag : undefined

  switch (tag) {
    case "ConfigurationError": {
      // Extract the useful part from a schema validation failure
      if (message.includes("Schema validation failed:")) {
        const details = message.split("Schema validation failed:")[1]?.trim() ?? ""
        return `Configuration validation failed\n${details}`
      }
      return `Configuration error: ${message}`
    }
    case "FileReadError":
      return "path" in error && typeof error.path === "string"
        ? `Cannot read file: ${error.path}`
        : "Cannot read configuration file"
    case "YamlParseError":
      return `Invalid YAML syntax: ${message}`
    case "BuildError":
      return `Cannot build feed: ${message}`
    case "ValidationError":
      return `Invalid product: ${message}`
    case "PipelineStageError":
      return `Stage failed: ${message}`
    case "IOError":
      return `Output error: ${message}`
    case "SourceError":
      return `Input error: ${message}`
    case "UsageError":
    case undefined:
      return message
    default:
      return `${tag}: ${message}`
  }
}
