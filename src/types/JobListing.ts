import { z } from 'zod';

/**
 * Schema for a job listing scraped from the careers portal
 */
export const JobListingSchema = z.object({
  title: z.string().min(1, 'Title is required'),
  link: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), 'Link must be an absolute http(s) URL'),
  location: z.string(), // empty when the row shows no duty station
  department: z.string().min(1).optional(),
  jobId: z.string().min(1).optional(), // PeopleSoft job opening id
  description: z.string().min(1, 'Description is required'),
});

/**
 * TypeScript type for job listing data
 */
export type JobListing = z.infer<typeof JobListingSchema>;

/**
 * Builds the one-line item description: title, location and department joined by " | "
 */
export function describeJob(
  job: Pick<JobListing, 'title' | 'location' | 'department'>
): string {
  const parts = [job.title];
  if (job.location) {
    parts.push(`Location: ${job.location}`);
  }
  if (job.department) {
    parts.push(`Department: ${job.department}`);
  }
  return parts.join(' | ');
}
