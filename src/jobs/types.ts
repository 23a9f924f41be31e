import { z } from "zod";

export const jobStatusSchema = z.enum(["queued", "building", "done", "failed"]);
export type JobStatus = z.infer<typeof jobStatusSchema>;

/** On-disk shape of a build job; snake_case keys are the file format. */
export const buildJobSchema = z.object({
  job_id: z.string().min(1),
  repo_url: z.string().min(1),
  status: jobStatusSchema,
  created_at: z.string(),
  output_url: z.string().optional(),
  finished_at: z.string().optional(),
  error: z.string().optional(),
});
export type BuildJob = z.infer<typeof buildJobSchema>;

export const createJobSchema = z.object({
  repo_url: z.string().min(1),
});

export class JobNotFoundError extends Error {
  readonly httpStatus = 404;
  readonly jobId: string;

  constructor(jobId: string) {
    super(`Job not found: ${jobId}`);
    this.name = "JobNotFoundError";
    this.jobId = jobId;
  }
}

export class InvalidRepoUrlError extends Error {
  readonly httpStatus = 400;

  constructor(repoUrl: string) {
    super(`Repository URL must be http(s): ${repoUrl}`);
    this.name = "InvalidRepoUrlError";
  }
}
