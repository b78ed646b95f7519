import { ConfigurationError } from './errors';
import { escapeShellArg } from '../utils/sanitizer';

export enum ProjectType {
  MAVEN = 'MAVEN',
  NPM = 'NPM',
  PIP = 'PIP',
}

export const PROJECT_TYPES: readonly ProjectType[] = Object.values(ProjectType);

export interface BuildProfile {
  readonly projectType: ProjectType;
  readonly imageReference: string;
  readonly markerFile: string;
  readonly commandSequence: readonly string[];
}

/** Directory inside the environment that receives the archive. Never user-controlled. */
export const WORK_DIR = '/app';
export const ARCHIVE_NAME = 'code.zip';
export const CONTAINER_ARCHIVE_PATH = `${WORK_DIR}/${ARCHIVE_NAME}`;
export const SOURCE_DIR = `${WORK_DIR}/src`;

/** Exit code used when no project root could be located in the extracted archive. */
export const NO_PROJECT_ROOT_EXIT_CODE = 66;

const extractSteps = (): string[] => [
  `mkdir -p ${SOURCE_DIR}`,
  `cd ${WORK_DIR}`,
  `unzip -o ${ARCHIVE_NAME} -d src`,
  "echo 'Unzipped code.'",
  `rm ${ARCHIVE_NAME}`,
  'cd src',
];

/**
 * Locate the directory holding the marker file, at most two levels deep.
 * Candidates are ranked shallowest first, then by byte-wise path order,
 * using only tools busybox also ships (its find has no -printf).
 */
export const locateRootSteps = (markerFile: string): string[] => {
  const marker = escapeShellArg(markerFile);
  const missing = escapeShellArg(`No ${markerFile} found within two directory levels of the archive root`);
  return [
    `BUILD_DIR=$(find . -maxdepth 2 -type f -name ${marker} | awk -F/ '{ print NF, $0 }' | LC_ALL=C sort -k1,1n -k2 | head -n 1 | cut -d' ' -f2- | sed 's|/[^/]*$||')`,
    `if [ -z "$BUILD_DIR" ]; then echo ${missing} >&2; exit ${NO_PROJECT_ROOT_EXIT_CODE}; fi`,
    'cd "$BUILD_DIR"',
    "echo 'Building in directory: ' $(pwd)",
    'ls -la',
  ];
};

const defineProfile = (
  projectType: ProjectType,
  imageReference: string,
  markerFile: string,
  setup: string[],
  build: string[]
): BuildProfile =>
  Object.freeze({
    projectType,
    imageReference,
    markerFile,
    commandSequence: Object.freeze([...setup, ...extractSteps(), ...locateRootSteps(markerFile), ...build]),
  });

const PROFILES: Readonly<Record<ProjectType, BuildProfile>> = Object.freeze({
  // The full maven image already ships unzip; the -slim variant does not
  [ProjectType.MAVEN]: defineProfile(
    ProjectType.MAVEN,
    'maven:3.8-openjdk-17',
    'pom.xml',
    [],
    ['mvn -B clean install -DskipTests']
  ),
  [ProjectType.NPM]: defineProfile(
    ProjectType.NPM,
    'node:20-alpine',
    'package.json',
    ['apk add --no-cache unzip'],
    ['npm install', 'npm run build']
  ),
  [ProjectType.PIP]: defineProfile(
    ProjectType.PIP,
    'python:3.11-slim',
    'requirements.txt',
    [
      'apt-get update',
      'apt-get install -y --no-install-recommends unzip',
      'rm -rf /var/lib/apt/lists/*',
    ],
    ['pip install --no-cache-dir -r requirements.txt']
  ),
});

const isProjectType = (value: string): value is ProjectType =>
  (PROJECT_TYPES as readonly string[]).includes(value);

/** Case-insensitive; surrounding whitespace is ignored. */
export const parseProjectType = (raw: string): ProjectType | null => {
  const normalized = raw.trim().toUpperCase();
  return isProjectType(normalized) ? normalized : null;
};

export const unsupportedProjectTypeMessage = (raw: string): string =>
  `Unsupported project type: ${raw}. Allowed types: ${PROJECT_TYPES.join(', ')}`;

export const selectProfile = (raw: string): BuildProfile => {
  const projectType = parseProjectType(raw);
  if (!projectType) {
    throw new ConfigurationError(unsupportedProjectTypeMessage(raw));
  }
  return PROFILES[projectType];
};

export const allProfiles = (): BuildProfile[] => PROJECT_TYPES.map((t) => PROFILES[t]);

/** The single shell invocation that runs a profile's steps in order, stopping at the first failure. */
export const toInvocation = (profile: BuildProfile): string[] => [
  '/bin/sh',
  '-c',
  profile.commandSequence.join(' && '),
];
