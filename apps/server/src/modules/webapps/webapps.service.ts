import { BadRequestException, Inject, Injectable, Logger, NotFoundException, OnModuleInit } from "@nestjs/common";
import type { RuntimeFormSchema, WebappBindings, WebappManifest } from "@paramform/shared-types";
import { manifestToRuntime, serializeManifest, summarizeManifest, type ManifestSummary } from "@paramform/schema-runtime";
import { checkManifest, formatIssue, hasErrors, validateBindings as checkBindings } from "@paramform/validation-engine";
import type { WebappEntry } from "@paramform/webapps";
import { WEBAPP_ENTRIES } from "./webapps.constants";

export interface CatalogEntry {
  id: string;
  label: string;
  description: string;
  icon: string;
  baseType: string;
  fieldCount: number;
}

@Injectable()
export class WebappsService implements OnModuleInit {
  private readonly logger = new Logger(WebappsService.name);
  private readonly catalog = new Map<string, WebappManifest>();

  constructor(@Inject(WEBAPP_ENTRIES) private readonly entries: WebappEntry[]) {}

  onModuleInit() {
    for (const entry of this.entries) this.register(entry);
  }

  /** Adds a manifest to the catalog. The first registration of an id wins. */
  register(entry: WebappEntry): boolean {
    if (this.catalog.has(entry.id)) {
      this.logger.error(`Webapp already registered: ${entry.id}`);
      return false;
    }

    const manifest = serializeManifest(entry.manifest);
    const issues = checkManifest(manifest);
    if (hasErrors(issues)) {
      const errors = issues.filter((issue) => issue.severity === "error").map(formatIssue);
      this.logger.error(`Rejected webapp manifest ${entry.id}: ${errors.join("; ")}`);
      return false;
    }
    for (const warning of issues) {
      this.logger.warn(`Webapp manifest ${entry.id}: ${formatIssue(warning)}`);
    }

    this.catalog.set(entry.id, manifest);
    this.logger.log(`Registered webapp manifest: ${entry.id} (${manifest.params.length} params)`);
    return true;
  }

  list(): CatalogEntry[] {
    return [...this.catalog].map(([id, manifest]) => ({
      id,
      label: manifest.meta.label,
      description: manifest.meta.description,
      icon: manifest.meta.icon,
      baseType: manifest.baseType,
      fieldCount: manifest.params.length
    }));
  }

  getManifest(id: string): WebappManifest {
    return serializeManifest(this.find(id));
  }

  getForm(id: string): RuntimeFormSchema {
    return manifestToRuntime(this.find(id), id);
  }

  getSummary(id: string): ManifestSummary {
    return summarizeManifest(this.find(id));
  }

  validateBindings(id: string, bindings: Record<string, unknown>): WebappBindings {
    const result = checkBindings(this.find(id), bindings);
    if (!result.ok) {
      throw new BadRequestException({ message: "Invalid bindings", issues: result.issues });
    }
    return result.bindings;
  }

  private find(id: string): WebappManifest {
    const manifest = this.catalog.get(id);
    if (!manifest) throw new NotFoundException(`Webapp not found: ${id}`);
    return manifest;
  }
}
