import { describe, expect, it } from "vitest";
import { ResponseShapeError } from "../../../src/errors";
import {
  attachVersion,
  decodeDeployment,
  decodeModel,
  decodePrediction,
  decodePredictionPage,
  decodeTraining,
  decodeVersion,
} from "../../../src/services/entityDecoder";
import { predictionPayload, versionPayload } from "../../support/fakeTransport";

describe("entity decoding", () => {
  it("keeps the raw version id and leaves the relation unresolved", () => {
    const prediction = decodePrediction(predictionPayload());

    expect(prediction.id).toBe("p1");
    expect(prediction.status).toBe("starting");
    expect(prediction.version_id).toBe("v1");
    expect(prediction.version).toBeUndefined();
    expect(prediction.urls?.cancel).toBe("https://api.example.test/v1/predictions/p1/cancel");
  });

  it("attaches a version the caller already holds", () => {
    const version = decodeVersion(versionPayload({ type: "string" }));
    const prediction = decodePrediction(predictionPayload(), { version });

    expect(prediction.version).toEqual(version);
  });

  it("does not attach a version the job does not refer to", () => {
    const other = decodeVersion(versionPayload({ type: "string" }, "v2"));
    const prediction = decodePrediction(predictionPayload(), { version: other });

    expect(prediction.version).toBeUndefined();
    expect(attachVersion({ id: "p9", status: "starting" as const }, other).version).toEqual(other);
  });

  it("drops unknown fields", () => {
    const prediction = decodePrediction(predictionPayload({ data_removed: false, deployment: "x/y" }));

    expect(Object.keys(prediction)).not.toContain("data_removed");
    expect(Object.keys(prediction)).not.toContain("deployment");
  });

  it("tolerates missing optional fields on a freshly created job", () => {
    expect(decodePrediction({ id: "p2", status: "starting" })).toEqual({
      id: "p2",
      status: "starting",
      version_id: null,
    });
  });

  it("rejects payloads without an id or a status", () => {
    expect(() => decodePrediction({ status: "starting" })).toThrow(ResponseShapeError);
    expect(() => decodePrediction({ id: "p3" })).toThrow(/Unexpected prediction payload \(status:/);
  });

  it("keeps statuses it does not know", () => {
    expect(decodePrediction({ id: "p3", status: "running" }).status).toBe("running");
  });

  it("decodes trainings with their destination", () => {
    const training = decodeTraining({
      id: "t1",
      status: "processing",
      version: "b1",
      destination: "acme/tuned",
      input: { steps: 10 },
    });

    expect(training).toEqual({
      id: "t1",
      status: "processing",
      version_id: "b1",
      destination: "acme/tuned",
      input: { steps: 10 },
    });
  });

  it("decodes a model with its latest version and default example", () => {
    const model = decodeModel({
      owner: "acme",
      name: "captioner",
      visibility: "public",
      latest_version: versionPayload({ type: "string" }, "v7"),
      default_example: predictionPayload({ status: "succeeded", output: "a cat" }),
    });

    expect(model.latest_version?.id).toBe("v7");
    expect(model.default_example?.version_id).toBe("v1");
    expect(model.default_example?.output).toBe("a cat");
  });

  it("decodes deployments and pages", () => {
    expect(
      decodeDeployment({
        owner: "acme",
        name: "prod",
        current_release: { number: 3, model: "acme/captioner", version: "v7" },
      }).current_release?.number,
    ).toBe(3);

    const page = decodePredictionPage({ results: [predictionPayload()], next: "https://api.example.test/v1/predictions?cursor=abc" });
    expect(page.results.map((item) => item.id)).toEqual(["p1"]);
    expect(page.next).toBe("https://api.example.test/v1/predictions?cursor=abc");
    expect(page.previous).toBeNull();
  });
});
