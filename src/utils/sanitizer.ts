import * as path from 'path';

// Path validation - ensure path stays within allowed directory
export const validatePathWithinDir = (filePath: string, allowedDir: string): string => {
  const resolved = path.resolve(filePath);
  const allowed = path.resolve(allowedDir);
  if (!resolved.startsWith(allowed + path.sep) && resolved !== allowed) {
    throw new Error('Path traversal detected');
  }
  return resolved;
};

// Stricter variant for files: the directory itself is not an acceptable target
export const validateFileWithinDir = (filePath: string, allowedDir: string): string => {
  const resolved = validatePathWithinDir(filePath, allowedDir);
  if (resolved === path.resolve(allowedDir)) {
    throw new Error('Path traversal detected');
  }
  return resolved;
};

// Shell argument escaping - wrap in single quotes, escape existing quotes
export const escapeShellArg = (arg: string): string => {
  return `'${arg.replace(/'/g, "'\\''")}'`;
};

// Mask sensitive data in strings (for logging)
const SENSITIVE_PATTERNS = [
  /dckr_pat_[A-Za-z0-9_-]+/g,
  /ghp_[A-Za-z0-9]+/g,
  /password[=:]\s*\S+/gi,
  /token[=:]\s*\S+/gi,
];

export const maskSensitiveData = (text: string): string => {
  let masked = text;
  for (const pattern of SENSITIVE_PATTERNS) {
    masked = masked.replace(pattern, '[REDACTED]');
  }
  return masked;
};

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};
