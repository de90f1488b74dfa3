import { z } from 'zod';

/**
 * Zod schemas for the persisted store file
 * These mirror TaskList / StoreData in lib/types.ts. Missing fields take
 * their empty defaults so older or hand-edited files still load.
 */

export const TaskListSchema = z.object({
    tasks: z.array(z.string()).default([]),
    reminder: z.string().default(''),
});

export const StoreFileSchema = z.record(z.string(), TaskListSchema);

export type ValidatedStoreFile = z.infer<typeof StoreFileSchema>;

/**
 * Raised when the store file parses as JSON but does not have the expected shape
 */
export class StoreValidationError extends Error {
    public readonly issues: z.ZodIssue[];

    constructor(error: z.ZodError) {
        const message = `Store file validation failed: ${error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join(', ')}`;
        super(message);
        this.name = 'StoreValidationError';
        this.issues = error.issues;
    }
}

/**
 * Validates decoded store file content
 * @throws {StoreValidationError} if validation fails
 */
export function validateStoreFile(data: unknown): ValidatedStoreFile {
    const result = StoreFileSchema.safeParse(data);
    if (!result.success) {
        throw new StoreValidationError(result.error);
    }
    return result.data;
}
