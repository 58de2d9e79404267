export class NotFoundError extends Error {
  constructor(entity: string, id: number) {
    super(`${entity} ${id} not found`);
    this.name = "NotFoundError";
  }
}

export class DuplicateRowError extends Error {
  constructor(
    readonly table: string,
    readonly id: number,
  ) {
    super(`Row ${id} already exists in ${table}`);
    this.name = "DuplicateRowError";
  }
}
