import { ClientError } from "../errors";
import { Deployment, Model, Page, Version } from "../types/job";
import { decodeDeployment, decodeModel, decodeVersion, decodeVersionPage } from "./entityDecoder";
import { Transport } from "./httpClient";

function modelPath(owner: string, name: string) {
  return `/models/${encodeURIComponent(owner)}/${encodeURIComponent(name)}`;
}

/** Read-only lookups of models, their versions and deployments. */
export class Catalog {
  constructor(private readonly transport: Transport) {}

  async getModel(owner: string, name: string): Promise<Model> {
    return decodeModel(await this.transport.request("GET", modelPath(owner, name)));
  }

  async getVersion(owner: string, name: string, id: string): Promise<Version> {
    const payload = await this.transport.request(
      "GET",
      `${modelPath(owner, name)}/versions/${encodeURIComponent(id)}`,
    );
    return decodeVersion(payload);
  }

  async listVersions(owner: string, name: string, cursor?: string | null): Promise<Page<Version>> {
    const payload = await this.transport.request("GET", cursor ?? `${modelPath(owner, name)}/versions`);
    return decodeVersionPage(payload);
  }

  async latestVersion(owner: string, name: string): Promise<Version> {
    const model = await this.getModel(owner, name);
    if (!model.latest_version) {
      throw new ClientError(`Model ${owner}/${name} has no published version`);
    }
    return model.latest_version;
  }

  async getDeployment(owner: string, name: string): Promise<Deployment> {
    const payload = await this.transport.request(
      "GET",
      `/deployments/${encodeURIComponent(owner)}/${encodeURIComponent(name)}`,
    );
    return decodeDeployment(payload);
  }
}
