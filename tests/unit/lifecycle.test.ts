import { beforeEach, describe, expect, it } from "vitest";
import { ComputeInstance } from "../../src/compute/instance.ts";
import { LifecycleController, refusal } from "../../src/compute/lifecycle.ts";
import { FakeComputeApi, fail, instanceData, mockLogger } from "../mocks/index.ts";

const POSITIVE = ["RUNNING", "PROVISIONING", "CREATING"];
const NEGATIVE = ["STOPPED", "STOPPING", "ERROR", "CRASHED"];
const INVALID = "Instance web has an invalid state for this operation.";

describe("LifecycleController", () => {
  let api: FakeComputeApi;
  let logger: ReturnType<typeof mockLogger>;

  async function controllerWithStatus(status: string): Promise<LifecycleController> {
    api.instances.set("vm-1", instanceData({ status }));
    const vm = await ComputeInstance.load("vm-1", { api, logger });
    return new LifecycleController(vm, api, logger);
  }

  beforeEach(() => {
    api = new FakeComputeApi();
    logger = mockLogger();
  });

  describe("start", () => {
    it.each(POSITIVE)("is a no-op while %s", async (status) => {
      const lifecycle = await controllerWithStatus(status);

      expect(await lifecycle.start()).toBeUndefined();
      expect(api.instanceAction).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith(INVALID);
    });

    it.each(NEGATIVE)("sends the command while %s", async (status) => {
      const lifecycle = await controllerWithStatus(status);

      expect(await lifecycle.start()).toBe("op-start-vm-1");
      expect(api.instanceAction).toHaveBeenCalledWith("vm-1", "start");
      expect(logger.info).toHaveBeenCalledWith("Starting instance web (vm-1)");
    });
  });

  describe("stop", () => {
    it("reports an already stopped instance at info level", async () => {
      const lifecycle = await controllerWithStatus("STOPPED");

      expect(await lifecycle.stop()).toBeUndefined();
      expect(api.instanceAction).not.toHaveBeenCalled();
      expect(logger.info).toHaveBeenCalledWith("Instance web already stopped.");
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it.each(["STOPPING", "ERROR", "CRASHED"])("warns about an invalid state while %s", async (status) => {
      const lifecycle = await controllerWithStatus(status);

      expect(await lifecycle.stop()).toBeUndefined();
      expect(api.instanceAction).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith(INVALID);
      expect(logger.info).not.toHaveBeenCalledWith("Instance web already stopped.");
    });

    it.each(POSITIVE)("sends the command while %s", async (status) => {
      const lifecycle = await controllerWithStatus(status);

      expect(await lifecycle.stop()).toBe("op-stop-vm-1");
      expect(logger.info).toHaveBeenCalledWith("Stopping instance web (vm-1)");
    });
  });

  describe("restart", () => {
    it.each(NEGATIVE)("is a no-op while %s", async (status) => {
      const lifecycle = await controllerWithStatus(status);

      expect(await lifecycle.restart()).toBeUndefined();
      expect(api.instanceAction).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith(INVALID);
    });

    it("sends the command while RUNNING", async () => {
      const lifecycle = await controllerWithStatus("RUNNING");

      expect(await lifecycle.restart()).toBe("op-restart-vm-1");
      expect(logger.info).toHaveBeenCalledWith("Restarting instance web (vm-1)");
    });
  });

  it("guards on the live status, not the one seen at construction", async () => {
    const lifecycle = await controllerWithStatus("RUNNING");
    api.instances.set("vm-1", instanceData({ status: "STOPPED" }));

    expect(await lifecycle.start()).toBe("op-start-vm-1");
    expect(api.getInstance).toHaveBeenCalledTimes(2);
  });

  it("returns nothing and logs the provider message on a request error", async () => {
    const lifecycle = await controllerWithStatus("RUNNING");
    api.instanceAction.mockResolvedValueOnce(fail(403, "Permission denied"));

    expect(await lifecycle.stop()).toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith("403 Error in stop_instance: Permission denied");
    expect(logger.info).not.toHaveBeenCalledWith("Stopping instance web (vm-1)");
  });

  it.each(["start", "stop", "restart"] as const)(
    "does not %s when the live status read fails",
    async (action) => {
      const lifecycle = await controllerWithStatus("STOPPED");
      api.getInstance.mockResolvedValueOnce(fail(500, "Internal error"));

      expect(await lifecycle[action]()).toBeUndefined();
      expect(api.instanceAction).not.toHaveBeenCalled();
      expect(logger.error).toHaveBeenCalledWith("500 Error in get_instance: Internal error");
      expect(logger.error).toHaveBeenCalledWith(`Can't ${action} instance web: current status could not be read.`);
    }
  );

  it("lets the provider reject a command for a non-existent instance", async () => {
    const vm = await ComputeInstance.load("vm-missing", { api, logger });
    const lifecycle = new LifecycleController(vm, api, logger);

    expect(await lifecycle.start()).toBeUndefined();
    expect(api.instanceAction).toHaveBeenCalledWith("vm-missing", "start");
    expect(logger.error).toHaveBeenCalledWith("404 Error in start_instance: Instance vm-missing not found");
  });
});

describe("refusal", () => {
  it("lets statuses outside both groups through for every action", () => {
    for (const action of ["start", "stop", "restart"] as const) {
      expect(refusal(action, "STARTING", "web")).toBeNull();
    }
  });

  it("refuses every action on an unreadable status", () => {
    expect(refusal("restart", "UNKNOWN", "web")).toEqual({
      level: "error",
      reason: "Can't restart instance web: current status could not be read.",
    });
  });

  it("distinguishes already-stopped from other invalid states", () => {
    expect(refusal("stop", "STOPPED", "web")).toEqual({ level: "info", reason: "Instance web already stopped." });
    expect(refusal("stop", "CRASHED", "web")).toEqual({ level: "warn", reason: INVALID });
  });
});
