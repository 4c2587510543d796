/**
 * Simple in-memory job tracking for background work like EPUB exports and
 * connectivity tests
 */

export interface JobResult {
  success: boolean;
  outputPath?: string;
  reply?: string;
  dimensions?: number;
  error?: string;
}

export interface JobProgress {
  id: string;
  kind: "export" | "llm-test" | "embedding-test";
  status: "pending" | "running" | "completed" | "error";
  progress: number; // 0-100
  message?: string;
  logs: string[];
  result?: JobResult;
  updatedAt: number;
}

// In-memory job store (jobs expire after 5 minutes)
const jobs = new Map<string, JobProgress>();
const JOB_EXPIRY_MS = 5 * 60 * 1000;

// SSE subscribers per job
const subscribers = new Map<string, Set<(progress: JobProgress) => void>>();

/**
 * Create a new job
 */
export function createJob(id: string, kind: JobProgress["kind"]): JobProgress {
  const job: JobProgress = {
    id,
    kind,
    status: "pending",
    progress: 0,
    logs: [],
    updatedAt: Date.now(),
  };
  jobs.set(id, job);
  return job;
}

function notify(job: JobProgress): void {
  const subs = subscribers.get(job.id);
  if (subs) {
    for (const callback of subs) {
      callback(job);
    }
  }
}

/**
 * Update job progress
 */
export function updateJobProgress(
  id: string,
  updates: Partial<Omit<JobProgress, "id" | "kind" | "logs" | "updatedAt">>,
): JobProgress | null {
  const job = jobs.get(id);
  if (!job) return null;

  Object.assign(job, updates, { updatedAt: Date.now() });
  notify(job);
  return job;
}

/**
 * Append a log line; it also becomes the job's current message
 */
export function appendJobLog(id: string, line: string): JobProgress | null {
  const job = jobs.get(id);
  if (!job) return null;

  job.logs.push(line);
  job.message = line;
  job.updatedAt = Date.now();
  notify(job);
  return job;
}

/**
 * Get job by ID
 */
export function getJob(id: string): JobProgress | null {
  const job = jobs.get(id);
  if (!job) return null;

  // Check if expired
  if (Date.now() - job.updatedAt > JOB_EXPIRY_MS) {
    jobs.delete(id);
    subscribers.delete(id);
    return null;
  }

  return job;
}

export function isJobActive(job: JobProgress | null): boolean {
  return job !== null && (job.status === "pending" || job.status === "running");
}

/**
 * Subscribe to job updates
 */
export function subscribeToJob(
  id: string,
  callback: (progress: JobProgress) => void,
): () => void {
  let subs = subscribers.get(id);
  if (!subs) {
    subs = new Set();
    subscribers.set(id, subs);
  }
  subs.add(callback);

  // Return unsubscribe function
  return () => {
    subs?.delete(callback);
    if (subs?.size === 0) {
      subscribers.delete(id);
    }
  };
}

/**
 * Run `task` as job `id` without awaiting it. The task's result decides
 * between "completed" and "error"; a thrown error is recorded on the job.
 */
export function runJob(id: string, task: () => Promise<JobResult>): void {
  updateJobProgress(id, { status: "running", progress: 1 });

  task()
    .then((result) => {
      updateJobProgress(id, {
        status: result.success ? "completed" : "error",
        progress: 100,
        result,
      });
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error(`[Jobs] Job ${id} failed:`, message);
      updateJobProgress(id, {
        status: "error",
        message,
        result: { success: false, error: message },
      });
    });
}

/**
 * Clean up completed/expired jobs periodically
 */
export function cleanupJobs(): void {
  const now = Date.now();
  for (const [id, job] of jobs) {
    if (now - job.updatedAt > JOB_EXPIRY_MS) {
      jobs.delete(id);
      subscribers.delete(id);
    }
  }
}

// Run cleanup every minute without keeping the process alive
setInterval(cleanupJobs, 60 * 1000).unref();
