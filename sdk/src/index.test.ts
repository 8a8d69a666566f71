import { jest, describe, it, expect, beforeEach } from "@jest/globals";
import {
  AclAdminClient,
  ClusterAuthorizationError,
  createAclAdminClient,
  ErrorCode,
  FilterResult,
  InMemoryAclBackend,
  InvalidRequestError,
  SecurityDisabledError,
  TimeoutError,
  UnknownServerError,
  aclBinding,
  aclBindingFilter,
  toFilterResults,
  type AclBackend,
  type AclBindingFilter,
} from "./index.js";

const readOrders = aclBinding(
  { resourceType: "topic", name: "orders", patternType: "literal" },
  { principal: "User:alice", host: "*", operation: "read", permissionType: "allow" }
);
const writeOrders = aclBinding(
  { resourceType: "topic", name: "orders", patternType: "literal" },
  { principal: "User:bob", host: "*", operation: "write", permissionType: "allow" }
);
const readPayments = aclBinding(
  { resourceType: "topic", name: "payments", patternType: "literal" },
  { principal: "User:alice", host: "*", operation: "read", permissionType: "allow" }
);

function topicFilter(topic: string | null): AclBindingFilter {
  return aclBindingFilter(
    { resourceType: "topic", name: topic, patternType: "literal" },
    { principal: null, host: null, operation: "any", permissionType: "any" }
  );
}

describe("AclAdminClient", () => {
  let backend: InMemoryAclBackend;
  let client: AclAdminClient;

  beforeEach(() => {
    backend = new InMemoryAclBackend([readOrders, writeOrders, readPayments]);
    client = new AclAdminClient({ backend });
  });

  describe("deleteAcls", () => {
    it("should delete across filters and combine the results", async () => {
      const result = client.deleteAcls([topicFilter("orders"), topicFilter("payments")]);

      await expect(result.all().get()).resolves.toEqual([readOrders, writeOrders, readPayments]);
      expect(backend.listAcls()).toEqual([]);
    });

    it("should fail all() with a denied binding but keep the other filter's result", async () => {
      backend.denyDeletion(writeOrders, ErrorCode.CLUSTER_AUTHORIZATION_FAILED, "User:bob is protected");
      const orders = topicFilter("orders");
      const payments = topicFilter("payments");
      const result = client.deleteAcls([orders, payments]);

      const error = await result.all().get().catch((err: unknown) => err);
      expect(error).toBeInstanceOf(ClusterAuthorizationError);
      expect(error).toHaveProperty("message", "User:bob is protected");

      await expect(result.resultsByFilter().get(payments)?.get()).resolves.toEqual({
        results: [FilterResult.deleted(readPayments)],
      });
      expect(backend.listAcls()).toEqual([writeOrders]);
    });

    it("should succeed with nothing when no binding matches", async () => {
      const result = client.deleteAcls([topicFilter("invoices")]);
      await expect(result.all().get()).resolves.toEqual([]);
    });

    it("should fail the filter and all() when the backend reports a filter error", async () => {
      const orders = topicFilter("orders");
      backend.failFilter(orders, ErrorCode.SECURITY_DISABLED);
      const result = client.deleteAcls([orders]);

      await expect(result.resultFor(orders)?.get()).rejects.toBeInstanceOf(SecurityDisabledError);
      await expect(result.all().get()).rejects.toBeInstanceOf(SecurityDisabledError);
    });

    it("should fail an invalid filter without calling the backend", async () => {
      const deleteAcls = jest.fn<AclBackend["deleteAcls"]>();
      const strict = new AclAdminClient({ backend: { deleteAcls } });
      const blank = topicFilter("");

      const result = strict.deleteAcls([blank]);

      await expect(result.resultFor(blank)?.get()).rejects.toThrow(
        new InvalidRequestError("Resource name cannot be empty; use null to match any name")
      );
      expect(deleteAcls).not.toHaveBeenCalled();
    });

    it("should fail a filter parsed from JSON with a missing name", async () => {
      const deleteAcls = jest.fn<AclBackend["deleteAcls"]>();
      const strict = new AclAdminClient({ backend: { deleteAcls } });
      const missingName = JSON.parse(
        '{"patternFilter":{"resourceType":"topic","patternType":"literal"},' +
          '"entryFilter":{"principal":null,"host":null,"operation":"any","permissionType":"any"}}'
      ) as AclBindingFilter;

      const result = strict.deleteAcls([missingName]);

      await expect(result.resultFor(missingName)?.get()).rejects.toThrow(
        new InvalidRequestError("Resource name must be a string or null")
      );
      await expect(result.all().get()).rejects.toBeInstanceOf(InvalidRequestError);
      expect(deleteAcls).not.toHaveBeenCalled();
    });

    it("should keep a missing-name filter apart from a match-any-name filter", () => {
      const missingName = JSON.parse(
        '{"patternFilter":{"resourceType":"topic","patternType":"literal"},' +
          '"entryFilter":{"principal":null,"host":null,"operation":"any","permissionType":"any"}}'
      ) as AclBindingFilter;

      const result = client.deleteAcls([missingName, topicFilter(null)]);

      expect(result.filters()).toEqual([missingName, topicFilter(null)]);
    });

    it("should fail a filter whose backend call rejects", async () => {
      const strict = new AclAdminClient({
        backend: { deleteAcls: () => Promise.reject(new Error("connection reset")) },
      });
      const orders = topicFilter("orders");
      const result = strict.deleteAcls([orders]);
      await expect(result.all().get()).rejects.toThrow("connection reset");
    });

    it("should time out a filter that takes too long", async () => {
      const slow = new AclAdminClient({
        backend: { deleteAcls: () => new Promise(() => {}) },
        requestTimeoutMs: 10,
      });
      const orders = topicFilter("orders");
      await expect(slow.deleteAcls([orders]).all().get()).rejects.toBeInstanceOf(TimeoutError);
    });

    it("should keep one future per distinct filter", () => {
      const result = client.deleteAcls([topicFilter("orders"), topicFilter("orders")]);
      expect(result.resultsByFilter().size).toBe(1);
    });
  });

  describe("events", () => {
    it("should emit deleting, then one event per filter", async () => {
      backend.failFilter(topicFilter("payments"), ErrorCode.NOT_CONTROLLER);
      const deletingSpy = jest.fn();
      const deletedSpy = jest.fn();
      const failedSpy = jest.fn();
      client.on("deleting", deletingSpy);
      client.on("filterDeleted", deletedSpy);
      client.on("filterFailed", failedSpy);

      const orders = topicFilter("orders");
      const payments = topicFilter("payments");
      const result = client.deleteAcls([orders, payments]);
      await result.summary().get();

      expect(deletingSpy).toHaveBeenCalledWith({ filterCount: 2 });
      expect(deletedSpy).toHaveBeenCalledWith({ filter: orders, deleted: 2, failed: 0 });
      expect(failedSpy).toHaveBeenCalledWith({
        filter: payments,
        error: expect.objectContaining({ code: ErrorCode.NOT_CONTROLLER }),
      });
    });
  });
});

describe("toFilterResults", () => {
  it("should map per-binding codes to outcomes in order", () => {
    const results = toFilterResults({
      errorCode: ErrorCode.NONE,
      matches: [
        { binding: readOrders, errorCode: ErrorCode.NONE },
        { binding: writeOrders, errorCode: 12345, errorMessage: "odd" },
      ],
    });

    expect(results.results).toHaveLength(2);
    expect(results.results[0]).toEqual(FilterResult.deleted(readOrders));
    const second = results.results[1];
    expect(second?.kind).toBe("failed");
    if (second?.kind === "failed") {
      expect(second.error).toBeInstanceOf(UnknownServerError);
      expect(second.error.code).toBe(12345);
      expect(second.error.message).toBe("odd");
    }
  });

  it("should throw the filter-level error", () => {
    expect(() => toFilterResults({ errorCode: ErrorCode.SECURITY_DISABLED, matches: [] })).toThrow(
      SecurityDisabledError
    );
  });
});

describe("createAclAdminClient", () => {
  it("should return a client instance", () => {
    expect(createAclAdminClient({ backend: new InMemoryAclBackend() })).toBeInstanceOf(AclAdminClient);
  });

  it("should throw descriptive errors for invalid configuration", () => {
    expect(() => createAclAdminClient({ backend: new InMemoryAclBackend(), concurrency: -1 })).toThrow(
      'Invalid concurrency value "-1". Must be an integer between 1 and 100.'
    );
  });
});
