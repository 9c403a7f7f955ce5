import { Employee } from '../types';

/**
 * Read-only employee directory, loaded once at startup.
 */
export class Directory {
  private readonly employees: ReadonlyMap<string, Readonly<Employee>>;

  constructor(employees: Employee[]) {
    this.employees = new Map(employees.map((e) => [e.id, Object.freeze({ ...e })]));
  }

  getAllEmployees(): Readonly<Employee>[] {
    return [...this.employees.values()];
  }

  getEmployeeById(id: string): Readonly<Employee> | null {
    return this.employees.get(id) ?? null;
  }

  getDirectReports(managerId: string): Readonly<Employee>[] {
    return this.getAllEmployees().filter((e) => e.manager_id === managerId);
  }
}

/**
 * Who approves this employee's leave: their manager, or nobody at the top
 * of the hierarchy.
 */
export function getApproverFor(employee: Readonly<Employee>): string | null {
  return employee.manager_id;
}
