import type { CalendarDate } from '../../../../shared/value-objects/CalendarDate';

export interface EmployeeRecordProps {
  /** 1-based line number in the source file (the header is line 1) */
  rowNumber: number;
  firstName: string;
  lastName: string;
  email: string;
  /** null when the cell was empty or unparseable */
  birthday: CalendarDate | null;
  /** null when the column is missing, the cell is empty, or it is unparseable */
  anniversary: CalendarDate | null;
}

/**
 * EmployeeRecord entity
 * One row of the employee file, with its date fields already parsed.
 * Immutable; built fresh on every run.
 */
export class EmployeeRecord {
  public readonly rowNumber: number;
  public readonly firstName: string;
  public readonly lastName: string;
  public readonly email: string;
  public readonly birthday: CalendarDate | null;
  public readonly anniversary: CalendarDate | null;

  public constructor(props: EmployeeRecordProps) {
    this.rowNumber = props.rowNumber;
    this.firstName = props.firstName;
    this.lastName = props.lastName;
    this.email = props.email;
    this.birthday = props.birthday;
    this.anniversary = props.anniversary;
  }

  public get fullName(): string {
    return `${this.firstName} ${this.lastName}`.trim();
  }
}
