/**
 * Azure Credentials Manager Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { ClientSecretCredential, DefaultAzureCredential, ManagedIdentityCredential } from "@azure/identity";
import { getDefaultConfig } from "../config.js";
import { AzureCredentialsManager, createCredentialsManager, createCredentialsManagerFromConfig } from "./manager.js";

// Mock @azure/identity
vi.mock("@azure/identity", () => {
  const mockGetToken = vi.fn().mockResolvedValue({
    token: "mock-token",
    expiresOnTimestamp: Date.now() + 3600000,
  });

  return {
    DefaultAzureCredential: vi.fn().mockImplementation(function () { return { getToken: mockGetToken }; }),
    AzureCliCredential: vi.fn().mockImplementation(function () { return { getToken: mockGetToken }; }),
    ClientSecretCredential: vi.fn().mockImplementation(function () { return { getToken: mockGetToken }; }),
    ManagedIdentityCredential: vi.fn().mockImplementation(function () { return { getToken: mockGetToken }; }),
  };
});

describe("AzureCredentialsManager", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("creates with default options", () => {
    const mgr = createCredentialsManager({ env: {} });
    expect(mgr).toBeInstanceOf(AzureCredentialsManager);
    expect(mgr.getSubscriptionId()).toBeUndefined();
  });

  it("getCredential returns a credential using the default chain", async () => {
    const mgr = createCredentialsManager({ credentialMethod: "default", env: {} });
    const result = await mgr.getCredential();
    expect(result.method).toBe("default");
    expect(DefaultAzureCredential).toHaveBeenCalledTimes(1);
    await expect(result.credential.getToken("scope")).resolves.toMatchObject({ token: "mock-token" });
  });

  it("getCredential uses CLI method", async () => {
    const mgr = createCredentialsManager({ credentialMethod: "cli", env: {} });
    const result = await mgr.getCredential();
    expect(result.method).toBe("cli");
  });

  it("getCredential caches credentials", async () => {
    const mgr = createCredentialsManager({ credentialMethod: "default", env: {} });
    const r1 = await mgr.getCredential();
    const r2 = await mgr.getCredential();
    expect(r1.credential).toBe(r2.credential);
    expect(DefaultAzureCredential).toHaveBeenCalledTimes(1);
  });

  it("clearCache forces a new credential", async () => {
    const mgr = createCredentialsManager({ credentialMethod: "default", env: {} });
    await mgr.getCredential();
    mgr.clearCache();
    await mgr.getCredential();
    expect(DefaultAzureCredential).toHaveBeenCalledTimes(2);
  });

  it("reads subscription and tenant from the environment", () => {
    const mgr = createCredentialsManager({
      env: { AZURE_SUBSCRIPTION_ID: "sub-123", AZURE_TENANT_ID: "tenant-456" },
    });
    expect(mgr.getSubscriptionId()).toBe("sub-123");
    expect(mgr.getTenantId()).toBe("tenant-456");
  });

  it("service-principal method requires env vars", async () => {
    const mgr = createCredentialsManager({ credentialMethod: "service-principal", env: {} });
    await expect(mgr.getCredential()).rejects.toThrow("Service principal auth requires");
  });

  it("service-principal method builds a client secret credential", async () => {
    const mgr = createCredentialsManager({
      credentialMethod: "service-principal",
      env: { AZURE_TENANT_ID: "tenant-1", AZURE_CLIENT_ID: "client-1", AZURE_CLIENT_SECRET: "test-secret" },
    });
    await mgr.getCredential();
    expect(ClientSecretCredential).toHaveBeenCalledWith("tenant-1", "client-1", "test-secret");
  });

  it("managed-identity passes a user-assigned client id", async () => {
    const mgr = createCredentialsManager({
      credentialMethod: "managed-identity",
      env: { AZURE_CLIENT_ID: "client-1" },
    });
    await mgr.getCredential();
    expect(ManagedIdentityCredential).toHaveBeenCalledWith({ clientId: "client-1" });
  });

  it("builds from resolved config", async () => {
    const config = { ...getDefaultConfig(), subscriptionId: "sub-9", credentialMethod: "cli" as const };
    const mgr = createCredentialsManagerFromConfig(config);
    expect(mgr.getSubscriptionId()).toBe("sub-9");
    await expect(mgr.getCredential()).resolves.toMatchObject({ method: "cli", subscriptionId: "sub-9" });
  });
});
