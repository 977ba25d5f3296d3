import { performance } from "node:perf_hooks";
import { defaultPassLogger, type PassLogger } from "../diagnostics/pass-debug.js";
import { walkModuleCode } from "../ir/module-utils.js";
import type { Expression } from "../ir/expressions.js";
import type { Func, Module } from "../ir/module.js";
import { createPass } from "./registry.js";

export interface Pass {
  readonly name: string;
  run(runner: PassRunner, module: Module): void;
}

/**
 * Per-function state of a function-parallel pass. A worker only ever sees the
 * one function it was created for.
 */
export interface FunctionWorker {
  visitFunction(func: Func): void;
}

export type PassRunnerOptions = {
  /** Defaults to console output when VTABLE_INDEXES_DEBUG is set */
  logger?: PassLogger;
};

export class PassRunner {
  readonly log: PassLogger;
  #passes: Pass[] = [];

  constructor({ logger }: PassRunnerOptions = {}) {
    this.log = logger ?? defaultPassLogger();
  }

  add(pass: Pass | string): this {
    this.#passes.push(typeof pass === "string" ? createPass(pass) : pass);
    return this;
  }

  get passNames(): string[] {
    return this.#passes.map((pass) => pass.name);
  }

  run(module: Module): void {
    this.#passes.forEach((pass) => {
      const start = performance.now();
      pass.run(this, module);
      const elapsed = performance.now() - start;
      this.log("pass", `${pass.name} finished in ${elapsed.toFixed(2)}ms`);
    });
  }

  /**
   * Hands each defined function to its own worker. Workers share no mutable
   * state, so the order in which they run is unobservable.
   */
  runOnFunctions(module: Module, createWorker: () => FunctionWorker): void {
    const tasks = module.functions
      .filter((func) => func.body !== undefined)
      .map((func) => ({ func, worker: createWorker() }));
    tasks.forEach(({ func, worker }) => worker.visitFunction(func));
  }

  walkModuleCode(module: Module, visit: (expr: Expression) => void): void {
    walkModuleCode(module, visit);
  }
}
