import type { Schema } from "ajv";

import { DURATION_PATTERN } from "../duration";
import { LOG_LEVELS } from "../logging";

function durationProperty(label: string) {
  return {
    type: "string",
    pattern: DURATION_PATTERN,
    errorMessage: {
      pattern: `${label} must be expressed as a duration like 500ms, 3s, 1m or 7d`,
    },
  } as const;
}

function positiveIntegerProperty(label: string, minimum: number) {
  return {
    type: "integer",
    minimum,
    errorMessage: {
      type: `${label} must be an integer`,
      minimum: `${label} must be at least ${minimum}`,
    },
  } as const;
}

const headersProperty = {
  type: "object",
  propertyNames: {
    type: "string",
    minLength: 1,
    errorMessage: {
      minLength: "Header names must not be empty",
    },
  },
  additionalProperties: {
    type: "string",
    errorMessage: {
      type: "Header values must be strings",
    },
  },
} as const;

export const monitorConfigSchema = {
  $id: "https://sitepulse.dev/schemas/monitor-config.json",
  type: "object",
  additionalProperties: false,
  required: ["targets"],
  properties: {
    concurrency: positiveIntegerProperty("Concurrency", 1),
    queue_depth: positiveIntegerProperty("Queue depth", 0),
    timeout: durationProperty("Timeout"),
    retry_limit: positiveIntegerProperty("Retry limit", 1),
    retry_delay: durationProperty("Retry delay"),
    retry_budget: durationProperty("Retry budget"),
    tick: durationProperty("Tick"),
    shutdown_grace: durationProperty("Shutdown grace"),
    interval_bounds: {
      type: "object",
      additionalProperties: false,
      properties: {
        min: durationProperty("Minimum interval"),
        max: durationProperty("Maximum interval"),
      },
    },
    backend: {
      type: "object",
      additionalProperties: false,
      properties: {
        type: {
          type: "string",
          enum: ["local", "distributed"],
          errorMessage: {
            enum: "backend.type must be one of: local, distributed",
          },
        },
        workers: {
          type: "array",
          uniqueItems: true,
          items: {
            type: "string",
            format: "uri",
            pattern: "^https?://",
            errorMessage: {
              format: "Worker addresses must be valid http(s) URLs",
              pattern: "Worker addresses must be valid http(s) URLs",
            },
          },
          errorMessage: {
            uniqueItems: "Worker addresses must be unique",
          },
        },
        worker_concurrency: positiveIntegerProperty("Worker concurrency", 1),
        dispatch_timeout: durationProperty("Dispatch timeout"),
        worker_cooldown: durationProperty("Worker cooldown"),
      },
    },
    worker: {
      type: "object",
      additionalProperties: false,
      properties: {
        listen: {
          type: "string",
          minLength: 1,
        },
      },
    },
    storage: {
      type: "object",
      additionalProperties: false,
      required: ["url"],
      properties: {
        url: {
          type: "string",
          pattern: "^(postgres|postgresql|memory)://",
          errorMessage: {
            pattern: "storage.url must start with postgres://, postgresql:// or memory://",
          },
        },
        max_connections: positiveIntegerProperty("Max connections", 1),
        write_retries: positiveIntegerProperty("Write retries", 0),
        write_backoff: durationProperty("Write backoff"),
      },
      errorMessage: {
        required: {
          url: "storage.url is required",
        },
      },
    },
    retention: {
      type: "object",
      additionalProperties: false,
      properties: {
        keep: durationProperty("Retention"),
        cadence: durationProperty("Rollup cadence"),
        lock_lease: durationProperty("Rollup lock lease"),
      },
    },
    log_level: {
      type: "string",
      enum: [...LOG_LEVELS],
      errorMessage: {
        enum: `log_level must be one of: ${LOG_LEVELS.join(", ")}`,
      },
    },
    metrics: {
      type: "object",
      additionalProperties: false,
      properties: {
        textfile: {
          type: "string",
          minLength: 1,
        },
        interval: durationProperty("Metrics interval"),
      },
    },
    targets: {
      type: "array",
      uniqueItemProperties: ["id"],
      errorMessage: {
        uniqueItemProperties: "Target ids must be unique",
      },
      items: {
        type: "object",
        additionalProperties: false,
        required: ["id", "url", "interval"],
        properties: {
          id: {
            type: "string",
            minLength: 1,
            errorMessage: {
              minLength: "Target id must not be empty",
            },
          },
          url: {
            type: "string",
            format: "uri",
            pattern: "^https?://",
            errorMessage: {
              format: "Target URL must be a valid URI",
              pattern: "Target URL must use http or https",
            },
          },
          interval: durationProperty("Interval"),
          pattern: {
            type: "string",
            minLength: 1,
          },
          method: {
            type: "string",
            enum: ["GET", "HEAD"],
            errorMessage: {
              enum: "method must be one of: GET, HEAD",
            },
          },
          headers: headersProperty,
          active: {
            type: "boolean",
          },
        },
        errorMessage: {
          required: {
            id: "Each target must define an id",
            url: "Each target must define a URL",
            interval: "Each target must define an interval",
          },
        },
      },
    },
  },
  errorMessage: {
    required: {
      targets: "The targets array is required",
    },
  },
} as const satisfies Schema & { errorMessage?: unknown };
