/** Unknown scenario or run id. */
export class NotFoundError extends Error {
  constructor(
    readonly resource: "scenario" | "run",
    readonly id: string,
  ) {
    super(`${resource === "scenario" ? "Scenario" : "Run"} not found: ${id}`);
    this.name = "NotFoundError";
  }

  toJSON() {
    return { error: "NOT_FOUND", message: this.message, resource: this.resource, id: this.id };
  }
}
