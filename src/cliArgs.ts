export const DEFAULT_USER_STORY = "API to manage Users with id, name, email; CRUD";

export const USAGE =
  'Usage: npm run cli -- [--story "..." | --story-file story.txt] [--out generated_project] [--offline] [--log-prompts]';

export interface CliOptions {
  help: boolean;
  story?: string;
  storyFile?: string;
  out?: string;
  offline: boolean;
  logPrompts: boolean;
}

const getArgValue = (argv: readonly string[], name: string): string | undefined => {
  const marker = `--${name}`;
  const index = argv.findIndex((arg) => arg === marker);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new Error(`Missing value for ${marker}.\n${USAGE}`);
  }
  return value;
};

const hasFlag = (argv: readonly string[], name: string): boolean => argv.includes(`--${name}`);

/** Parses the arguments after the script name. */
export const parseCliArgs = (argv: readonly string[]): CliOptions => {
  if (hasFlag(argv, "help")) {
    return { help: true, offline: false, logPrompts: false };
  }

  const story = getArgValue(argv, "story");
  const storyFile = getArgValue(argv, "story-file");
  if (story !== undefined && storyFile !== undefined) {
    throw new Error(`Pass either --story or --story-file, not both.\n${USAGE}`);
  }

  return {
    help: false,
    story,
    storyFile,
    out: getArgValue(argv, "out"),
    offline: hasFlag(argv, "offline"),
    logPrompts: hasFlag(argv, "log-prompts")
  };
};
