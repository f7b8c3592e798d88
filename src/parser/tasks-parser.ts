/**
 * Parser for tasks.md specification files
 *
 * Recognized structure:
 * - `# Tasks: <title>` document title, `**Input**:` / `**Branch**:` metadata
 * - `## Phase <N>: <title>` opens a phase; any other level-2 heading closes it
 * - `**Purpose**:`, `**Goal**:`, `**Checkpoint**:`, `**Independent Test**:`,
 *   `**Priority**:`, `**MVP**:` lines attach to the open phase
 * - `### <title>` (or `### Task Group: <title>`, optional `(US<n>)` suffix) opens a group
 * - `- [ ] T001 [P] [US1] description` checklist lines are tasks
 *
 * Fenced code blocks, blank lines and other prose are ignored.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ParseError, StructuralError } from './errors.js';
import type { Phase, Task, TaskGroup, TasksDocument } from './models.js';

const FENCE_PATTERN = /^(```|~~~)/;
const TITLE_PATTERN = /^#\s+(?:Tasks:\s*)?(.+)$/;
const INPUT_PATTERN = /^\*\*Input\*\*:\s*(.+)$/;
const BRANCH_PATTERN = /^\*\*Branch\*\*:\s*`?(.+?)`?$/;
const PHASE_PATTERN = /^##\s+Phase\s+(\d+)\s*:\s*(.+)$/;
const LEVEL2_PATTERN = /^##\s/;
const GROUP_PATTERN = /^###\s+(?:Task Group:\s*)?(.+?)(?:\s*\((US\d+)\))?\s*$/;
const PHASE_METADATA_PATTERN =
  /^\*\*(Purpose|Goal|Checkpoint|Independent Test|Priority|MVP)(?::\*\*|\*\*:?)\s*(.*)$/i;
const CHECKLIST_PATTERN = /^-\s+\[([ xX])\]\s*(.*)$/;
const TASK_ID_PATTERN = /^([A-Z]+\d+)(?![\w-])\s*(.*)$/;

const PARALLEL_MARKER = /\[P\]/g;
const USER_STORY_MARKER = /\[(US\d+)\]/;
const BRACKETED_PATH = /\[([^\]\s]*\/[^\]\s]*)\]/g;
const BACKTICK_PATH = /`([^`\s]*\/[^`\s]*|[^`\s]+\.\w+)`/g;
const FILE_PATH_PATTERN = /\b[\w-]+(?:\/[\w.-]+)+\.\w+/g;

const PRIORITY_IN_HEADING = /(?:\(\s*)?(?:Priority:\s*)?\b(P\d)\b(?:\s*\))?/;
const USER_STORY_IN_HEADING = /User Story\s+(\d+)|\b(US\d+)\b/;
const MVP_EMOJI = '🎯';
const MVP_WORD = /\bMVP\b/;

/**
 * Parsed phase heading parts
 */
export interface PhaseHeading {
  title: string;
  priority?: string;
  userStory?: string;
  isPrimaryDeliverable: boolean;
}

/**
 * Parsed task line parts (everything after the checklist box)
 */
export interface TaskLine {
  id: string;
  description: string;
  completed: boolean;
  parallel: boolean;
  userStory?: string;
  filePaths: string[];
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Extract file paths from task text: bracketed or backticked tokens first,
 * then bare tokens that look like `dir/file.ext`
 */
export function extractFilePaths(text: string): string[] {
  const found: string[] = [];
  const add = (candidate: string) => {
    if (!found.includes(candidate)) {
      found.push(candidate);
    }
  };

  for (const match of text.matchAll(BRACKETED_PATH)) {
    add(match[1]);
  }
  for (const match of text.matchAll(BACKTICK_PATH)) {
    add(match[1]);
  }
  const remainder = text.replace(BRACKETED_PATH, ' ').replace(BACKTICK_PATH, ' ');
  for (const match of remainder.matchAll(FILE_PATH_PATTERN)) {
    add(match[0]);
  }

  return found;
}

/**
 * Split a phase heading such as
 * "User Story 1 - Generate Connectors (Priority: P1) 🎯 MVP"
 * into title, priority, user story and primary-deliverable flag
 */
export function parsePhaseHeading(heading: string): PhaseHeading {
  let title = heading;
  let priority: string | undefined;
  let userStory: string | undefined;

  const isPrimaryDeliverable = heading.includes(MVP_EMOJI) || MVP_WORD.test(heading);

  const priorityMatch = PRIORITY_IN_HEADING.exec(title);
  if (priorityMatch) {
    priority = priorityMatch[1];
    title = title.replace(priorityMatch[0], ' ');
  }

  const storyMatch = USER_STORY_IN_HEADING.exec(heading);
  if (storyMatch) {
    userStory = storyMatch[1] ? `US${storyMatch[1]}` : storyMatch[2];
  }

  title = title.split(MVP_EMOJI).join(' ').replace(MVP_WORD, ' ');
  title = collapseWhitespace(title).replace(/[\s\-–:]+$/, '');

  return { title, priority, userStory, isPrimaryDeliverable };
}

/**
 * Parse the text after `- [ ]`. Markers are recognized anywhere in the text
 * and in any order.
 */
export function parseTaskLine(checkMark: string, text: string, line: number): TaskLine {
  const idMatch = TASK_ID_PATTERN.exec(text.trim());
  if (!idMatch) {
    throw new ParseError(
      `Checklist item "${text.trim()}" has no task identifier`,
      line,
      'task',
      'task identifier such as T001'
    );
  }

  const id = idMatch[1];
  let rest = idMatch[2];

  const parallel = rest.match(PARALLEL_MARKER) !== null;
  rest = rest.replace(PARALLEL_MARKER, ' ');

  let userStory: string | undefined;
  const storyMatch = USER_STORY_MARKER.exec(rest);
  if (storyMatch) {
    userStory = storyMatch[1];
    rest = rest.replace(USER_STORY_MARKER, ' ');
  }

  const filePaths = extractFilePaths(rest);

  let description = collapseWhitespace(rest.replace(BRACKETED_PATH, '$1'));
  if (description.startsWith(':')) {
    description = description.slice(1).trim();
  }

  if (!description) {
    throw new ParseError(`Task ${id} has no description`, line, 'task', 'task description');
  }

  return {
    id,
    description,
    completed: checkMark.toUpperCase() === 'X',
    parallel,
    userStory,
    filePaths,
  };
}

function applyPhaseMetadata(phase: Phase, key: string, value: string): void {
  const trimmed = value.trim();
  switch (key.toLowerCase()) {
    case 'purpose':
      phase.purpose ??= trimmed;
      break;
    case 'goal':
      phase.goal ??= trimmed;
      break;
    case 'checkpoint':
      phase.checkpoint ??= trimmed;
      break;
    case 'independent test':
      phase.independentTest ??= trimmed;
      break;
    case 'priority': {
      const priority = /\bP\d\b/.exec(trimmed)?.[0] ?? trimmed;
      phase.priority ??= priority || undefined;
      break;
    }
    case 'mvp':
      if (!/^(no|false|0)$/i.test(trimmed)) {
        phase.isPrimaryDeliverable = true;
      }
      break;
  }
}

/**
 * Parse tasks.md content into a TasksDocument
 *
 * @throws ParseError for malformed lines
 * @throws StructuralError for broken invariants (orphan or duplicate tasks, phase order)
 */
export function parseTasksDocument(content: string): TasksDocument {
  const lines = content.split(/\r?\n/);
  const document: TasksDocument = { title: 'Untitled', phases: [] };

  let titleSeen = false;
  let inFence = false;
  let currentPhase: Phase | null = null;
  let currentGroup: TaskGroup | null = null;
  const taskLines = new Map<string, number>();

  for (const [index, raw] of lines.entries()) {
    const lineNumber = index + 1;
    const line = raw.trim();

    if (FENCE_PATTERN.test(line)) {
      inFence = !inFence;
      continue;
    }
    if (inFence || !line) {
      continue;
    }

    if (line.startsWith('# ')) {
      const match = TITLE_PATTERN.exec(line);
      if (match && !titleSeen) {
        document.title = match[1].trim();
        titleSeen = true;
      }
      currentPhase = null;
      currentGroup = null;
      continue;
    }

    const inputMatch = INPUT_PATTERN.exec(line);
    if (inputMatch && !currentPhase) {
      document.inputPath ??= inputMatch[1].trim();
      continue;
    }
    const branchMatch = BRANCH_PATTERN.exec(line);
    if (branchMatch && !currentPhase) {
      document.branch ??= branchMatch[1].trim();
      continue;
    }

    const phaseMatch = PHASE_PATTERN.exec(line);
    if (phaseMatch) {
      const number = Number.parseInt(phaseMatch[1], 10);
      const previous = document.phases[document.phases.length - 1];
      if (previous && number <= previous.number) {
        throw new StructuralError(
          `Phase ${number} follows Phase ${previous.number}`,
          lineNumber,
          'phase',
          `phase number greater than ${previous.number}`
        );
      }

      const heading = parsePhaseHeading(phaseMatch[2]);
      const phase: Phase = {
        number,
        title: heading.title,
        priority: heading.priority,
        userStory: heading.userStory,
        isPrimaryDeliverable: heading.isPrimaryDeliverable,
        groups: [],
        tasks: [],
        line: lineNumber,
      };
      document.phases.push(phase);
      currentPhase = phase;
      currentGroup = null;
      continue;
    }

    if (LEVEL2_PATTERN.test(line)) {
      // Non-phase section such as "## Dependencies & Execution Order"
      currentPhase = null;
      currentGroup = null;
      continue;
    }

    if (line.startsWith('### ')) {
      const groupMatch = GROUP_PATTERN.exec(line);
      if (currentPhase && groupMatch) {
        const title = groupMatch[1].trim();
        // A repeated heading continues the group it names
        const existing = currentPhase.groups.find((group) => group.title === title);
        if (existing) {
          if (!existing.userStory) {
            existing.userStory = groupMatch[2];
          }
          currentGroup = existing;
          continue;
        }
        const group: TaskGroup = {
          title,
          phaseNumber: currentPhase.number,
          userStory: groupMatch[2],
          tasks: [],
          line: lineNumber,
        };
        currentPhase.groups.push(group);
        currentGroup = group;
      }
      continue;
    }

    if (line.startsWith('#')) {
      continue;
    }

    const metadataMatch = PHASE_METADATA_PATTERN.exec(line);
    if (metadataMatch && currentPhase) {
      applyPhaseMetadata(currentPhase, metadataMatch[1], metadataMatch[2]);
      continue;
    }

    const checklistMatch = CHECKLIST_PATTERN.exec(line);
    if (!checklistMatch) {
      continue;
    }

    const parsed = parseTaskLine(checklistMatch[1], checklistMatch[2], lineNumber);

    if (!currentPhase) {
      throw new StructuralError(
        `Task ${parsed.id} has no owning phase`,
        lineNumber,
        'task',
        'a "## Phase <N>: <title>" heading before the first task'
      );
    }

    const firstLine = taskLines.get(parsed.id);
    if (firstLine !== undefined) {
      throw new StructuralError(
        `Duplicate task identifier ${parsed.id} (first declared on line ${firstLine})`,
        lineNumber,
        'task',
        'a task identifier unique across the document'
      );
    }
    taskLines.set(parsed.id, lineNumber);

    const task: Task = {
      ...parsed,
      phaseNumber: currentPhase.number,
      groupTitle: currentGroup ? currentGroup.title : null,
      line: lineNumber,
    };

    if (currentGroup) {
      currentGroup.tasks.push(task);
    } else {
      currentPhase.tasks.push(task);
    }
  }

  return document;
}

/**
 * Read and parse a tasks.md file from disk
 *
 * @param tasksPath - Path to the file (relative to cwd or absolute)
 */
export function parseTasksFile(tasksPath: string): TasksDocument {
  const absolutePath = path.isAbsolute(tasksPath)
    ? tasksPath
    : path.resolve(process.cwd(), tasksPath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Tasks file not found: ${absolutePath}`);
  }

  return parseTasksDocument(fs.readFileSync(absolutePath, 'utf-8'));
}
