import { z } from "zod";
import type { ClientContext } from "../context.js";
import { DEFAULT_MODEL, ENDPOINTS } from "../lib/constants.js";
import type { Transport } from "../transport/transport.js";
import { parseResult } from "./results.js";
import type { ServiceResult } from "./results.js";

export const modelInfoSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    displayName: z.string().optional(),
    provider: z.string().optional()
  })
  .passthrough();

const modelListSchema = z.object({ models: z.array(modelInfoSchema) });

const selectionModesSchema = z
  .object({
    modes: z.array(z.record(z.unknown())).default([]),
    default: z.string().optional()
  })
  .passthrough();

export type ModelInfo = z.infer<typeof modelInfoSchema>;
export type SelectionModes = z.infer<typeof selectionModesSchema>;

export class ModelService {
  private selected: string = DEFAULT_MODEL;
  private catalog: ModelInfo[] | null = null;

  constructor(
    private readonly transport: Transport,
    private readonly context: ClientContext
  ) {}

  async listModels(): Promise<ServiceResult<"models", ModelInfo[]>> {
    const payload = await this.transport.request({
      method: "POST",
      path: ENDPOINTS.modelList,
      kind: "model"
    });
    const result = parseResult("models", modelListSchema, payload, this.context.logger);
    if (result.kind === "raw") {
      return result;
    }
    this.catalog = result.data.models;
    return { kind: "models", data: result.data.models };
  }

  async getSelectionModes(): Promise<ServiceResult<"selection-modes", SelectionModes>> {
    const payload = await this.transport.request({
      method: "POST",
      path: ENDPOINTS.modelSelectionModes,
      kind: "model"
    });
    return parseResult("selection-modes", selectionModesSchema, payload, this.context.logger);
  }

  /**
   * Checked against the last loaded catalog by id or name. Before any
   * catalog is loaded every name is accepted.
   */
  selectModel(name: string): boolean {
    if (this.catalog && !this.catalog.some((model) => model.name === name || model.id === name)) {
      this.context.logger.warn({ model: name }, "Model is not in the available list");
      return false;
    }
    this.selected = name;
    this.context.logger.info({ model: name }, "Model selected");
    return true;
  }

  getSelectedModel(): string {
    return this.selected;
  }
}
