/**
 * Deadline Scheduler Example
 *
 * Runs jobs earliest-deadline-first. Jobs are tracked by id, so a deadline can
 * be moved or a job cancelled while it is queued.
 * Run with: npx tsx examples/deadline-scheduler.ts
 */

import { IndexedHeap, logger } from "@prioset/sdk";

interface Job {
  id: string;
  name: string;
}

function at(time: string): Date {
  return new Date(`2025-03-01T${time}:00Z`);
}

function main(): void {
  logger.info("scheduler.start", { heap: "deadlines", message: "queueing jobs" });

  // Dates order with the default comparer
  const queue = new IndexedHeap<Job, Date>({ keyOf: (job) => job.id, label: "deadlines" });

  queue.insert({ id: "invoice", name: "Send invoices" }, at("17:00"));
  queue.insert({ id: "backup", name: "Nightly backup" }, at("23:30"));
  queue.insert({ id: "report", name: "Weekly report" }, at("12:00"));
  queue.insert({ id: "cleanup", name: "Clean temp files" }, at("20:00"));
  console.log(`📥 Queued ${queue.count} jobs`);

  // The backup window moved up; the cleanup is no longer needed
  queue.tryUpdate({ id: "backup", name: "" }, at("09:00"));
  queue.tryRemove({ id: "cleanup", name: "" });
  console.log("✏️  Moved backup to 09:00, cancelled cleanup");

  const next = queue.peekMin();
  console.log(`⏭️  Next up: ${next.element.name} at ${next.priority.toISOString()}`);

  console.log("\n▶️  Running jobs in deadline order:");
  for (const { element, priority } of queue.drain()) {
    console.log(`   ${priority.toISOString().slice(11, 16)}  ${element.name}`);
  }

  queue.validate();
  console.log("\n✅ Example completed successfully!");
}

main();
