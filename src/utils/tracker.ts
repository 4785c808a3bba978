/**
 * Download Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";
import { HttpError, isAbortError } from "../http/errors";

// ============================================================================
// Types
// ============================================================================

// Type-safe reasons for each issue type
export type ItemIssueReason = "not-found" | "empty" | "error";
export type ModuleIssueReason = "no-units" | "no-content";
export type UnitIssueReason = "unresolved" | "no-content";
export type ImageIssueReason = "download-failed" | "write-failed";
export type CatalogIssueReason =
  | "http-error"
  | "timeout"
  | "schema-validation"
  | "network-error";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

// Discriminated union - each type has its own subset of reasons
export interface ItemIssue {
  type: "item";
  path: string;
  reason: ItemIssueReason;
  details?: string;
}

export interface ModuleIssue {
  type: "module";
  path: string;
  reason: ModuleIssueReason;
  details?: string;
}

export interface UnitIssue {
  type: "unit";
  path: string;
  reason: UnitIssueReason;
  details?: string;
}

export interface ImageIssue {
  type: "image";
  path: string;
  reason: ImageIssueReason;
  details?: string;
}

export interface CatalogIssue {
  type: "catalog";
  path: string;
  reason: CatalogIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue =
  | ItemIssue
  | ModuleIssue
  | UnitIssue
  | ImageIssue
  | CatalogIssue
  | ResourceIssue;
export type IssueType = Issue["type"];

export interface DownloadStats {
  // Top-level items (paths, modules, courses)
  requestedItems: number;
  downloadedItems: number;
  failedItems: number;

  modules: number;
  failedModules: number;

  // Unit counts
  resolvedUnits: number;
  failedUnits: number;

  // Image counts
  downloadedImages: number;
  cachedImages: number;
  failedImages: number;

  writtenFiles: string[];
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapCatalogError(error: unknown): IssueInfo<CatalogIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof HttpError) {
    return { reason: "http-error", details: error.message };
  }
  if (isAbortError(error)) {
    return { reason: "timeout", details: "request timed out" };
  }
  return {
    reason: "network-error",
    details: error instanceof Error ? error.message : String(error),
  };
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  return {
    reason: "read-error",
    details: error instanceof Error ? error.message : String(error),
  };
}

// ============================================================================
// Tracker - Main tracker class
// ============================================================================

export class Tracker {
  private requestedItems = 0;
  private downloadedItems = 0;
  private failedItems = 0;
  private modules = 0;
  private failedModules = 0;
  private resolvedUnits = 0;
  private failedUnits = 0;
  private downloadedImages = 0;
  private cachedImages = 0;
  private failedImages = 0;
  private writtenFiles: string[] = [];
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  addRequestedItems(count: number): void {
    this.requestedItems += count;
  }

  incrementDownloadedItems(): void {
    this.downloadedItems++;
  }

  incrementModules(): void {
    this.modules++;
  }

  incrementResolvedUnits(): void {
    this.resolvedUnits++;
  }

  incrementImagesDownloaded(): void {
    this.downloadedImages++;
  }

  incrementImagesCached(): void {
    this.cachedImages++;
  }

  addWrittenFile(path: string): void {
    this.writtenFiles.push(path);
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackItemFailure(path: string, reason: ItemIssueReason, details?: string): void {
    this.failedItems++;
    this.issues.push({ type: "item", path, reason, details });
  }

  trackModuleFailure(path: string, reason: ModuleIssueReason, details?: string): void {
    this.failedModules++;
    this.issues.push({ type: "module", path, reason, details });
  }

  trackUnitFailure(path: string, reason: UnitIssueReason, details?: string): void {
    this.failedUnits++;
    this.issues.push({ type: "unit", path, reason, details });
  }

  trackImageFailure(path: string, reason: ImageIssueReason, details?: string): void {
    this.failedImages++;
    this.issues.push({ type: "image", path, reason, details });
  }

  /**
   * Track an issue from an error, auto-detecting the reason based on error type
   */
  trackError(path: string, error: unknown, type: "catalog" | "resource"): void {
    if (type === "catalog") {
      this.issues.push({ type, path, ...mapCatalogError(error) });
    } else {
      this.issues.push({ type, path, ...mapResourceError(error) });
    }
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): DownloadStats {
    return {
      requestedItems: this.requestedItems,
      downloadedItems: this.downloadedItems,
      failedItems: this.failedItems,
      modules: this.modules,
      failedModules: this.failedModules,
      resolvedUnits: this.resolvedUnits,
      failedUnits: this.failedUnits,
      downloadedImages: this.downloadedImages,
      cachedImages: this.cachedImages,
      failedImages: this.failedImages,
      writtenFiles: [...this.writtenFiles],
      issues: [...this.issues],
      duration: Date.now() - this.startTime.getTime(),
    };
  }
}
