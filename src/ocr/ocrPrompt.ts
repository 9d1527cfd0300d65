import { ProjectSummary } from '../types/task';

export const TASK_SHEET_PROMPT = `
The image shows a handwritten daily task sheet. A symbol detector has drawn a labelled box
next to each line marking its status: NOT_STARTED, IN_PROGRESS, MEETING or COMPLETED.

Read the sheet and return the tasks on it:
1. Transcribe each task's handwritten text. A task may wrap onto several lines; join those
   lines into one task name.
2. Give each task the status of the symbol drawn beside it, using exactly one of
   NOT_STARTED, IN_PROGRESS, MEETING, COMPLETED.
3. A line whose symbol sits clearly further right than the line above is a subtask of that
   line. When the indentation is not obvious, treat the line as a top-level task. Only add
   a "subtasks" array to tasks that actually have subtasks.
4. Number top-level tasks in reading order with "order", starting at 1. Subtasks are
   numbered the same way within their parent.
5. Pick the project each task most likely belongs to from the list at the end and put its
   id in "projectRef". Subtasks use their parent's project. Use null when nothing fits.
6. Leave plannedAt, startedAt and completedAt as the JSON literal null. Never write the
   string "null" or "N/A" in these fields.

Reply with the JSON object alone, shaped like this:

{
  "tasks": [
    {
      "name": "task text",
      "status": "IN_PROGRESS",
      "plannedAt": null,
      "startedAt": null,
      "completedAt": null,
      "order": 1,
      "projectRef": "project-id or null",
      "subtasks": [
        {
          "name": "subtask text",
          "status": "NOT_STARTED",
          "plannedAt": null,
          "startedAt": null,
          "completedAt": null,
          "order": 1,
          "projectRef": "project-id or null"
        }
      ]
    }
  ]
}

## Projects
`;

export function formatProjectList(projects: readonly ProjectSummary[]): string {
  if (projects.length === 0) return 'No projects are registered.';
  return projects
    .map((project) => `- ${project.id} (${project.name}): ${project.description || 'No description'}`)
    .join('\n');
}

export function buildOcrPrompt(projects: readonly ProjectSummary[]): string {
  return `${TASK_SHEET_PROMPT.trim()}\n${formatProjectList(projects)}`;
}
