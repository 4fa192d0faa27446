/**
 * rds-diagnostics-mcp - Types Unit Tests
 *
 * Tests for error classes defined in types/index.ts
 */

import { describe, it, expect } from "vitest";
import {
  RdsMcpError,
  ConfigurationError,
  UpstreamError,
  UnsupportedEngineError,
  ValidationError,
  InstanceNotFoundError,
} from "../index.js";

describe("Error Classes", () => {
  describe("RdsMcpError", () => {
    it("should carry message, code and details", () => {
      const error = new RdsMcpError("Test error", "TEST_CODE", { id: 1 });

      expect(error).toBeInstanceOf(Error);
      expect(error.message).toBe("Test error");
      expect(error.code).toBe("TEST_CODE");
      expect(error.details).toEqual({ id: 1 });
      expect(error.name).toBe("RdsMcpError");
    });
  });

  it.each([
    [new ConfigurationError("bad flag"), "ConfigurationError", "CONFIGURATION_ERROR"],
    [new UpstreamError("throttled"), "UpstreamError", "UPSTREAM_ERROR"],
    [new ValidationError("bad input"), "ValidationError", "VALIDATION_ERROR"],
    [new InstanceNotFoundError(), "InstanceNotFoundError", "INSTANCE_NOT_FOUND"],
  ])("%s should be an RdsMcpError named %s", (error, name, code) => {
    expect(error).toBeInstanceOf(RdsMcpError);
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
  });

  it("should default the not-found message", () => {
    expect(new InstanceNotFoundError().message).toBe(
      "No matching RDS instance found",
    );
    expect(
      new InstanceNotFoundError("RDS instance not found: test-db-1").message,
    ).toBe("RDS instance not found: test-db-1");
  });

  it("should name the unsupported engine", () => {
    const error = new UnsupportedEngineError("sqlserver-ex");

    expect(error.message).toBe("Unsupported database engine: sqlserver-ex");
    expect(error.code).toBe("UNSUPPORTED_ENGINE");
    expect(error.engine).toBe("sqlserver-ex");
    expect(error.details).toEqual({ engine: "sqlserver-ex" });
  });
});
