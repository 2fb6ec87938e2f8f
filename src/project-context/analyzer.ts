/**
 * Project context detection.
 *
 * Looks at the working directory for manifests, tool configuration and
 * common directories so the planner can ask about the developer's actual
 * setup. Indicator tables live in `data/project-indicators.json`.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Logger, silentLogger } from '../utils/logger.js';
import { safeExistsSync, safeIsDirectorySync, safeReadFileSync } from '../utils/safe-fs.js';

/**
 * What was detected in a project directory. List fields are sorted.
 */
export interface ProjectContext {
  readonly languages: readonly string[];
  readonly frameworks: readonly string[];
  readonly packageManagers: readonly string[];
  readonly hasTests: boolean;
  readonly hasDocker: boolean;
  readonly hasGit: boolean;
  readonly ideConfig: readonly string[];
  readonly lintingTools: readonly string[];
  readonly ciCd: readonly string[];
  /** Up to ten dependency names per ecosystem (`npm`, `python`). */
  readonly dependencies: Readonly<Record<string, readonly string[]>>;
  /** `scripts` of package.json, when present. */
  readonly scripts: Readonly<Record<string, string>>;
  /** Common top-level directories that exist, in a fixed order. */
  readonly directoryStructure: readonly string[];
}

/**
 * Context of a directory where nothing was detected.
 */
export const EMPTY_PROJECT_CONTEXT: ProjectContext = Object.freeze({
  languages: [],
  frameworks: [],
  packageManagers: [],
  hasTests: false,
  hasDocker: false,
  hasGit: false,
  ideConfig: [],
  lintingTools: [],
  ciCd: [],
  dependencies: {},
  scripts: {},
  directoryStructure: [],
});

interface ManifestIndicator {
  path: string;
  languages?: string[];
  packageManager?: string;
  frameworks?: string[];
}

interface NamedPath {
  path: string;
  name: string;
}

interface ProjectIndicators {
  manifests: ManifestIndicator[];
  dockerFiles: string[];
  ideConfigs: NamedPath[];
  lintingFiles: NamedPath[];
  ciConfigs: NamedPath[];
  testDirectories: string[];
  commonDirectories: string[];
  npmFrameworks: Record<string, string>;
  pythonFrameworks: Record<string, string>;
}

const INDICATORS_PATH = fileURLToPath(
  new URL('../../data/project-indicators.json', import.meta.url)
);

const MAX_LISTED_DEPENDENCIES = 10;

let cachedIndicators: ProjectIndicators | undefined;

function loadIndicators(): ProjectIndicators {
  cachedIndicators ??= JSON.parse(safeReadFileSync(INDICATORS_PATH)) as ProjectIndicators;
  return cachedIndicators;
}

/**
 * Options for analyzeProjectContext.
 */
export interface AnalyzeOptions {
  /** Receives a debug entry for manifests that could not be parsed. */
  readonly logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringRecord(value: unknown): Record<string, string> {
  if (!isRecord(value)) {
    return {};
  }
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') {
      result[key] = entry;
    }
  }
  return result;
}

/**
 * Extracts the package name from a requirements.txt line.
 */
export function requirementName(line: string): string {
  return line.split('==')[0]?.split('>=')[0]?.split('~=')[0]?.trim() ?? '';
}

/**
 * Analyzes a directory for languages, frameworks and tooling.
 *
 * @param directory - Directory to inspect (default: the current directory).
 */
export function analyzeProjectContext(
  directory: string = process.cwd(),
  options: AnalyzeOptions = {}
): ProjectContext {
  const logger = options.logger ?? silentLogger;
  const indicators = loadIndicators();
  const at = (relative: string): string => path.join(directory, relative);
  const exists = (relative: string): boolean => safeExistsSync(at(relative));

  const languages = new Set<string>();
  const frameworks = new Set<string>();
  const packageManagers = new Set<string>();

  for (const manifest of indicators.manifests) {
    if (!exists(manifest.path)) {
      continue;
    }
    manifest.languages?.forEach((language) => languages.add(language));
    manifest.frameworks?.forEach((framework) => frameworks.add(framework));
    if (manifest.packageManager !== undefined) {
      packageManagers.add(manifest.packageManager);
    }
  }

  const namesPresent = (entries: readonly NamedPath[]): string[] =>
    [...new Set(entries.filter((entry) => exists(entry.path)).map((entry) => entry.name))].sort();

  const dependencies: Record<string, readonly string[]> = {};
  let scripts: Record<string, string> = {};

  if (exists('package.json')) {
    try {
      const packageJson: unknown = JSON.parse(safeReadFileSync(at('package.json')));
      if (isRecord(packageJson)) {
        const allDeps = {
          ...stringRecord(packageJson['dependencies']),
          ...stringRecord(packageJson['devDependencies']),
        };
        for (const [dependency, framework] of Object.entries(indicators.npmFrameworks)) {
          if (Object.hasOwn(allDeps, dependency)) {
            frameworks.add(framework);
          }
        }
        scripts = stringRecord(packageJson['scripts']);
        dependencies['npm'] = Object.keys(allDeps).slice(0, MAX_LISTED_DEPENDENCIES);
      }
    } catch (error) {
      logger.debug('manifest_unreadable', {
        file: 'package.json',
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  if (exists('requirements.txt')) {
    const requirements = safeReadFileSync(at('requirements.txt'))
      .split('\n')
      .filter((line) => line.trim() !== '' && !line.startsWith('#'))
      .map(requirementName);
    for (const requirement of requirements) {
      const framework = indicators.pythonFrameworks[requirement.toLowerCase()];
      if (framework !== undefined) {
        frameworks.add(framework);
      }
    }
    dependencies['python'] = requirements.slice(0, MAX_LISTED_DEPENDENCIES);
  }

  return {
    languages: [...languages].sort(),
    frameworks: [...frameworks].sort(),
    packageManagers: [...packageManagers].sort(),
    hasTests: indicators.testDirectories.some(exists),
    hasDocker: indicators.dockerFiles.some(exists),
    hasGit: exists('.git'),
    ideConfig: namesPresent(indicators.ideConfigs),
    lintingTools: namesPresent(indicators.lintingFiles),
    ciCd: namesPresent(indicators.ciConfigs),
    dependencies,
    scripts,
    directoryStructure: indicators.commonDirectories.filter((name) =>
      safeIsDirectorySync(at(name))
    ),
  };
}

/**
 * One-line human-readable summary of a project context.
 *
 * @example
 * "Languages: JavaScript, TypeScript; Tools: Git, Tests"
 */
export function getProjectSummary(context: ProjectContext): string {
  const parts: string[] = [];

  if (context.languages.length > 0) {
    parts.push(`Languages: ${context.languages.join(', ')}`);
  }
  if (context.frameworks.length > 0) {
    parts.push(`Frameworks: ${context.frameworks.join(', ')}`);
  }
  if (context.packageManagers.length > 0) {
    parts.push(`Package managers: ${context.packageManagers.join(', ')}`);
  }

  const features: string[] = [];
  if (context.hasGit) {
    features.push('Git');
  }
  if (context.hasDocker) {
    features.push('Docker');
  }
  if (context.hasTests) {
    features.push('Tests');
  }
  if (context.ideConfig.length > 0) {
    features.push(`IDE: ${context.ideConfig.join(', ')}`);
  }
  if (context.lintingTools.length > 0) {
    features.push(`Linting: ${context.lintingTools.join(', ')}`);
  }
  if (features.length > 0) {
    parts.push(`Tools: ${features.join(', ')}`);
  }

  return parts.length > 0 ? parts.join('; ') : 'No specific project structure detected';
}

/**
 * True when enough was detected to tailor planner questions to the project.
 */
export function shouldEnhanceQuestions(context: ProjectContext): boolean {
  return (
    context.languages.length > 0 ||
    context.frameworks.length > 0 ||
    context.hasGit ||
    context.hasDocker ||
    context.hasTests
  );
}
