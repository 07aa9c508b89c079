import { z } from 'zod';

/**
 * Columns every employee file must carry in its header row.
 * `anniversary` is optional and may be absent from the header entirely.
 */
export const REQUIRED_EMPLOYEE_COLUMNS = ['first_name', 'last_name', 'email', 'birthday'] as const;

/**
 * Zod schema for one parsed row of the employee file
 *
 * Cells are kept as raw, trimmed strings here; dates are parsed afterwards
 * so that a bad date only blanks its own field instead of rejecting the row.
 * Short rows (fewer cells than headers) read as empty strings.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const EmployeeRowSchema = z.object({
  first_name: z.string().trim().default(''),
  last_name: z.string().trim().default(''),
  email: z.string().trim().default(''),
  birthday: z.string().trim().default(''),
  anniversary: z.string().trim().default(''),
});

/**
 * TypeScript type derived from EmployeeRowSchema
 */
export type EmployeeRow = z.infer<typeof EmployeeRowSchema>;

/**
 * Zod schema for a hex colour string: 6 hex digits with or without a leading
 * '#', or the 3-digit '#RGB' shorthand (the '#' is required for shorthand).
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const HexColorSchema = z
  .string()
  .trim()
  .regex(/^(#?[0-9a-fA-F]{6}|#[0-9a-fA-F]{3})$/, 'Colour must be #RGB, #RRGGBB or RRGGBB');
