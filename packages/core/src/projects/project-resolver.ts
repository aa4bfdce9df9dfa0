/**
 * Queue name → project id resolution.
 *
 * A queue name is either a project's full name ("chore queue") or a path of
 * names from a root project down ("Chores/Rotating Chore Queue").
 */

import type { ProjectId, RemoteProject } from '../types/remote.js';

const PATH_SEPARATOR = '/';

function sameName(projectName: string, wanted: string): boolean {
  return projectName.trim().toLowerCase() === wanted.toLowerCase();
}

/**
 * Resolve a name or hierarchical path to a project id, or null.
 *
 * An exact (case-insensitive) name match always wins, so names that contain
 * "/" literally still resolve. Otherwise every root whose name matches the
 * first segment is walked down in listing order; at each level the first
 * child with a matching name is taken. The first root whose walk completes
 * wins. Duplicate root names are therefore only disambiguated by listing
 * order, which the service does not guarantee.
 */
export function resolveProjectPath(projects: readonly RemoteProject[], path: string): ProjectId | null {
  const wanted = path.trim();

  const exact = projects.find((p) => sameName(p.name, wanted));
  if (exact) return exact.id;

  if (!wanted.includes(PATH_SEPARATOR)) return null;
  return resolveHierarchicalPath(projects, wanted);
}

function resolveHierarchicalPath(projects: readonly RemoteProject[], path: string): ProjectId | null {
  const [first, ...rest] = path.split(PATH_SEPARATOR).map((part) => part.trim());
  if (first === undefined) return null;

  const byId = new Map<ProjectId, RemoteProject>();
  const children = new Map<ProjectId, ProjectId[]>();
  for (const p of projects) {
    byId.set(p.id, p);
    if (p.parentId) {
      const siblings = children.get(p.parentId) ?? [];
      siblings.push(p.id);
      children.set(p.parentId, siblings);
    }
  }

  const roots = projects.filter((p) => !p.parentId && sameName(p.name, first));

  for (const root of roots) {
    const found = walk(root.id, rest, byId, children);
    if (found !== null) return found;
  }
  return null;
}

function walk(
  startId: ProjectId,
  segments: readonly string[],
  byId: ReadonlyMap<ProjectId, RemoteProject>,
  children: ReadonlyMap<ProjectId, readonly ProjectId[]>,
): ProjectId | null {
  let currentId = startId;
  for (const segment of segments) {
    const next = (children.get(currentId) ?? []).find((childId) => {
      const child = byId.get(childId);
      return child !== undefined && sameName(child.name, segment);
    });
    if (next === undefined) return null;
    currentId = next;
  }
  return currentId;
}
