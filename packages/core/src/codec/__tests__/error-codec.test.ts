import { AppError } from "../../app-error.js";
import { ErrorCode } from "../../error-code.js";
import {
  ApiError,
  BusinessRuleViolationError,
  ConfigurationError,
  ConflictError,
  Errors,
  NotFoundError,
  UnauthorizedError,
  UnhandledExceptionError,
  ValidationError,
} from "../../errors.js";
import { DecodeError, EncodeError } from "../../library-errors.js";
import { NONE } from "../../result.js";
import { Codec } from "../codec.js";
import {
  BrokenError,
  CachedLookupError,
  CustomerNotFoundError,
  OrderNotFoundError,
  RateLimitedError,
  SessionExpiredError,
  WebhookFailedError,
  WrappedError,
  customerNotFoundCode,
} from "./customer-errors.js";

class UnregisteredError extends AppError {}

class LocalCode extends ErrorCode {
  readonly name = "LocalError";
}

describe("AppError codec", () => {
  const codec = new Codec();

  describe("built-in variants", () => {
    it.each([
      Errors.api("upstream returned 502"),
      Errors.businessRuleViolation("order already shipped"),
      Errors.configuration("missing DATABASE_URL"),
      Errors.conflict("email taken"),
      Errors.notFound("User 7 not found"),
      Errors.unauthorized("token expired"),
      Errors.validation("name is required"),
      Errors.exception(new Error("boom")),
    ])("should round-trip $description", (error) => {
      const decoded = codec.decodeError(codec.encodeError(error));

      expect(decoded.constructor).toBe(error.constructor);
      expect(decoded.code).toBe(error.code);
      expect(decoded.description).toBe(error.description);
    });

    it("should keep each variant's type", () => {
      const types = [
        ApiError,
        BusinessRuleViolationError,
        ConfigurationError,
        ConflictError,
        NotFoundError,
        UnauthorizedError,
        UnhandledExceptionError,
        ValidationError,
      ];

      for (const type of types) {
        const decoded = codec.decodeError(codec.encodeError(new type("x")));
        expect(decoded).toBeInstanceOf(type);
      }
    });

    it("should write the tag, code and description", () => {
      expect(codec.encodeError(Errors.notFound("User 7 not found"))).toEqual({
        $type: "NotFoundError",
        code: { $type: "NotFoundErrorCode", $name: "NotFoundError" },
        description: "User 7 not found",
      });
    });

    it("should rebuild the base AppError with any registered code", () => {
      const decoded = codec.decodeError(
        codec.encodeError(new AppError(customerNotFoundCode, "plain base error"))
      );

      expect(decoded.constructor).toBe(AppError);
      expect(decoded.code).toBe(customerNotFoundCode);
    });
  });

  describe("externally declared variants", () => {
    it("should round-trip a variant with an extra field", () => {
      const text = codec.serializeError(new CustomerNotFoundError("Customer 42 not found", "c-42"));

      expect(text).toBe(
        '{"$type":"CustomerNotFoundError","code":{"$type":"CustomerNotFoundErrorCode","$name":"CustomerNotFoundError"},"description":"Customer 42 not found","customerId":"c-42"}'
      );

      const decoded = codec.deserializeErrorAs(text, CustomerNotFoundError);
      expect(decoded).toBeInstanceOf(CustomerNotFoundError);
      expect(decoded.customerId).toBe("c-42");
      expect(decoded.code).toBe(customerNotFoundCode);
    });

    it("should rebuild a subclass of a built-in from its own fields", () => {
      const decoded = codec.decodeError(codec.encodeError(new OrderNotFoundError(7)));

      expect(decoded).toBeInstanceOf(OrderNotFoundError);
      expect(decoded.isErrorType(NotFoundError)).toBe(true);
      expect(decoded.description).toBe("Order 7 not found");
      expect(decoded.code).toBe(Errors.notFound("x").code);
    });

    it("should bind fields to parameters ignoring case", () => {
      const decoded = codec.decodeErrorAs(
        { $type: "CustomerNotFoundError", DESCRIPTION: "Customer 9 not found", CustomerID: "c-9" },
        CustomerNotFoundError
      );

      expect(decoded.description).toBe("Customer 9 not found");
      expect(decoded.customerId).toBe("c-9");
    });

    it("should decode nested errors through the same registry", () => {
      const wrapped = new WrappedError("sync failed", new CustomerNotFoundError("gone", "c-1"));

      const decoded = codec.decodeErrorAs(codec.encodeError(wrapped), WrappedError);

      expect(decoded.inner).toBeInstanceOf(CustomerNotFoundError);
      expect(decoded.inner.code).toBe(customerNotFoundCode);
    });
  });

  describe("constructor candidates", () => {
    it("should prefer the candidate with the most parameters", () => {
      const decoded = codec.decodeErrorAs(
        { $type: "RateLimitedError", description: "slow down", retryAfterSeconds: 15, source: "edge" },
        RateLimitedError
      );

      expect(decoded.retryAfterSeconds).toBe(15);
      expect(decoded.source).toBe("edge");
    });

    it("should apply declared defaults for absent fields", () => {
      const decoded = codec.decodeErrorAs(
        { $type: "RateLimitedError", description: "slow down", retryAfterSeconds: 15 },
        RateLimitedError
      );

      expect(decoded.source).toBe("gateway");
    });

    it("should fall back when a required field is missing", () => {
      const decoded = codec.decodeErrorAs(
        { $type: "RateLimitedError", description: "slow down" },
        RateLimitedError
      );

      expect(decoded.retryAfterSeconds).toBe(60);
      expect(decoded.source).toBe("fallback");
    });

    it("should fall back when a candidate throws", () => {
      const decoded = codec.decodeErrorAs(
        { $type: "RateLimitedError", description: "slow down", retryAfterSeconds: -1 },
        RateLimitedError
      );

      expect(decoded.retryAfterSeconds).toBe(60);
    });

    it("should fall back when a field schema throws while parsing", () => {
      const decoded = codec.decodeErrorAs(
        { $type: "WebhookFailedError", description: "hook failed", endpoint: "http://example.test" },
        WebhookFailedError
      );

      expect(decoded.endpoint).toBe("unknown");
    });

    it("should report a field schema that throws as a rejected candidate", () => {
      let failure: unknown;
      try {
        codec.decodeError({ $type: "WebhookFailedError", endpoint: "http://example.test" });
      } catch (e) {
        failure = e;
      }

      expect(failure).toBeInstanceOf(DecodeError);
      expect(failure instanceof DecodeError && failure.reasons).toEqual([
        "(description, endpoint) threw endpoint must use https",
        "(description) description: Required",
      ]);
    });

    it("should report every rejected candidate", () => {
      let failure: unknown;
      try {
        codec.decodeError({ $type: "RateLimitedError", retryAfterSeconds: 5 });
      } catch (e) {
        failure = e;
      }

      expect(failure).toBeInstanceOf(DecodeError);
      expect(failure instanceof DecodeError && failure.reasons).toEqual([
        "(description, retryAfterSeconds, source) description: Required",
        "(description) description: Required",
      ]);
    });

    it("should fail when the only candidate throws", () => {
      expect(() =>
        codec.decodeError({
          $type: "BrokenError",
          code: { $type: "NotFoundErrorCode" },
          description: "x",
        })
      ).toThrow(
        "Could not find a compatible constructor for Error type 'BrokenError' ((code, description) threw not rebuildable)"
      );
    });

    it("should reject a code where an error is expected", () => {
      expect(() =>
        codec.decodeError({
          $type: "WrappedError",
          description: "x",
          inner: { $type: "NotFoundErrorCode" },
        })
      ).toThrow("'NotFoundErrorCode' is not an AppError type");
    });
  });

  describe("exclusions", () => {
    it("should leave excluded fields off the wire", () => {
      expect(codec.encodeError(new CachedLookupError("lookup failed", 2))).toEqual({
        $type: "CachedLookupError",
        code: { $type: "CachedLookupErrorCode", $name: "CachedLookupError" },
        description: "lookup failed",
        attempts: 2,
      });
    });

    it("should write non-public fields unless they are excluded", () => {
      expect(codec.encodeError(new SessionExpiredError("session expired", "alice", "test-secret"))).toEqual({
        $type: "SessionExpiredError",
        code: { $type: "UnauthorizedErrorCode", $name: "UnauthorizedError" },
        description: "session expired",
        actor: "alice",
      });
    });

    it("should rebuild a variant whose private field was excluded", () => {
      const decoded = codec.decodeErrorAs(
        codec.encodeError(new SessionExpiredError("session expired", "alice", "test-secret")),
        SessionExpiredError
      );

      expect(decoded.description).toBe("session expired");
      expect(decoded.hasToken()).toBe(false);
    });

    it("should rebuild without the excluded field", () => {
      const decoded = codec.decodeErrorAs(
        codec.encodeError(new CachedLookupError("lookup failed", 2)),
        CachedLookupError
      );

      expect(decoded.attempts).toBe(2);
      expect(decoded.cachedAt).toEqual(new Date(0));
    });
  });

  describe("rejections", () => {
    it.each([
      ["a missing tag", { description: "x" }],
      ["an empty tag", { $type: "", description: "x" }],
      ["a non-object", 42],
      ["null", null],
    ])("should reject %s", (_label, payload) => {
      expect(() => codec.decodeError(payload)).toThrow(/^Error payload requires a \$type property/);
    });

    it("should reject an unknown tag", () => {
      expect(() => codec.decodeError({ $type: "Date", description: "x" })).toThrow(
        "Unknown Error type: 'Date'"
      );
    });

    it("should reject a tag naming a code rather than an error", () => {
      expect(() =>
        codec.decodeError({ $type: "NotFoundErrorCode", description: "x" })
      ).toThrow("'NotFoundErrorCode' is not an AppError type");
    });

    it("should reject a payload of another variant in decodeErrorAs", () => {
      expect(() =>
        codec.decodeErrorAs(codec.encodeError(Errors.notFound("x")), ConflictError)
      ).toThrow("Expected ConflictError, payload decoded to NotFoundError");
    });

    it("should reject nesting deeper than maxDepth", () => {
      const shallow = new Codec({ config: { maxDepth: 2 } });
      const deep = new WrappedError(
        "a",
        new WrappedError("b", new WrappedError("c", Errors.notFound("d")))
      );
      const payload = codec.encodeError(deep);

      expect(() => shallow.decodeError(payload)).toThrow(/Error nesting exceeds 2/);
      expect(() => shallow.encodeError(deep)).toThrow("Error nesting exceeds 2");
    });
  });

  describe("encoding failures", () => {
    it("should refuse an unregistered variant", () => {
      expect(() => codec.encodeError(new UnregisteredError(customerNotFoundCode, "x"))).toThrow(
        "Error type 'UnregisteredError' is not registered"
      );
    });

    it("should refuse an unregistered code", () => {
      expect(() => codec.encodeError(new AppError(new LocalCode(), "x"))).toThrow(EncodeError);
    });

    it("should refuse the None sentinel", () => {
      expect(() => codec.encodeError(NONE)).toThrow("ErrorCode 'None' is not registered");
    });
  });
});
