/**
 * Supported where operators.
 *
 * `*` and `!*` test attribute presence and take no value.
 */
export type FilterOperator =
  | "="
  | "!"
  | "!="
  | ">="
  | "<="
  | "~="
  | "*"
  | "!*"
  | "starts_with"
  | "not_starts_with"
  | "ends_with"
  | "not_ends_with"
  | "contains"
  | "not_contains";

export const FILTER_OPERATORS: readonly FilterOperator[] = [
  "=",
  "!",
  "!=",
  ">=",
  "<=",
  "~=",
  "*",
  "!*",
  "starts_with",
  "not_starts_with",
  "ends_with",
  "not_ends_with",
  "contains",
  "not_contains",
];

export function isFilterOperator(value: unknown): value is FilterOperator {
  return FILTER_OPERATORS.some((operator) => operator === value);
}

export function isPresenceOperator(value: unknown): value is "*" | "!*" {
  return value === "*" || value === "!*";
}

/**
 * A single clause of a query, either a where comparison whose value is
 * already escaped, or a pre-built raw filter.
 */
export type FilterClause =
  | {
      type: "where";
      field: string;
      operator: FilterOperator;
      value: string;
    }
  | {
      type: "raw";
      filter: string;
    };

export type QueryFilters = {
  and: FilterClause[];
  or: FilterClause[];
};

/**
 * Compiles query clauses into an LDAP filter string.
 */
export class FilterGrammar {
  /**
   * Compile the given filters.
   *
   * A single AND clause combined with OR clauses is folded into the OR
   * group, so `where(a).orWhere(b)` reads `(|(a)(b))`.
   */
  public compile(filters: QueryFilters): string {
    const ands = filters.and.map((clause) => this.compileClause(clause));
    const ors = filters.or.map((clause) => this.compileClause(clause));

    if (ands.length === 0 && ors.length === 0) {
      return "(objectclass=*)";
    }

    if (ors.length === 0) {
      return ands.length === 1 ? ands[0] : this.compileAnd(ands.join(""));
    }

    if (ands.length === 0) {
      return ors.length === 1 ? ors[0] : this.compileOr(ors.join(""));
    }

    if (ands.length === 1) {
      return this.compileOr(ands[0] + ors.join(""));
    }

    return this.compileAnd(ands.join("") + this.compileOr(ors.join("")));
  }

  /**
   * Compile the clauses of a nested group without any folding.
   */
  public compileNested(filters: QueryFilters): string[] {
    return [...filters.and, ...filters.or].map((clause) => this.compileClause(clause));
  }

  public compileClause(clause: FilterClause): string {
    if (clause.type === "raw") {
      return this.wrap(clause.filter);
    }

    const { field, value } = clause;

    switch (clause.operator) {
      case "=":
        return `(${field}=${value})`;
      case "!":
      case "!=":
        return this.compileNot(`(${field}=${value})`);
      case ">=":
        return `(${field}>=${value})`;
      case "<=":
        return `(${field}<=${value})`;
      case "~=":
        return `(${field}~=${value})`;
      case "*":
        return `(${field}=*)`;
      case "!*":
        return this.compileNot(`(${field}=*)`);
      case "starts_with":
        return `(${field}=${value}*)`;
      case "not_starts_with":
        return this.compileNot(`(${field}=${value}*)`);
      case "ends_with":
        return `(${field}=*${value})`;
      case "not_ends_with":
        return this.compileNot(`(${field}=*${value})`);
      case "contains":
        return `(${field}=*${value}*)`;
      case "not_contains":
        return this.compileNot(`(${field}=*${value}*)`);
    }
  }

  public compileAnd(filter: string): string {
    return `(&${filter})`;
  }

  public compileOr(filter: string): string {
    return `(|${filter})`;
  }

  public compileNot(filter: string): string {
    return `(!${filter})`;
  }

  /**
   * Wrap the filter in parentheses unless it already is.
   */
  public wrap(filter: string): string {
    return filter.startsWith("(") && filter.endsWith(")") ? filter : `(${filter})`;
  }
}
