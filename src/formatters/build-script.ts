/**
 * Wrapper build script (build.bat / build.sh)
 *
 * Puts the toolchain on PATH, runs the pre-build commands, the build and the
 * post-build commands from the project directory.
 */
import type { HostShell } from '../types/index.js';

export interface BuildScriptInput {
  projectTitle: string;
  hostShell: HostShell;
  /** Toolchain bin directory, when installed under a known root */
  toolBinDir?: string;
  /** Project directory relative to the script's directory, empty when the same */
  projectDirFromScript: string;
  /** build.ninja relative to the project directory */
  ninjaFile: string;
  /** Ninja executable; `ninja` from PATH when absent */
  ninjaPath?: string;
  before: string[];
  after: string[];
}

/**
 * File name of the wrapper script for a shell
 */
export function buildScriptName(hostShell: HostShell): string {
  return hostShell === 'cmd' ? 'build.bat' : 'build.sh';
}

function quoteIfNeeded(value: string): string {
  return /\s/.test(value) ? `"${value}"` : value;
}

function formatBatch(input: BuildScriptInput): string {
  const lines = ['@echo off', `rem Generated by cbp2clangd from project "${input.projectTitle}"`, 'setlocal', ''];

  const projectDir = input.projectDirFromScript.replace(/\//g, '\\');
  lines.push(`cd /d "%~dp0${projectDir}"`);
  if (input.toolBinDir) {
    lines.push(`set "PATH=${input.toolBinDir};%PATH%"`);
  }
  lines.push('');

  if (input.before.length > 0) {
    lines.push('rem Pre-build commands');
    for (const command of input.before) {
      lines.push(`call ${command}`, 'if %errorlevel% neq 0 exit /b %errorlevel%');
    }
    lines.push('');
  }

  const ninja = quoteIfNeeded(input.ninjaPath ?? 'ninja');
  lines.push(`${ninja} -f ${quoteIfNeeded(input.ninjaFile.replace(/\//g, '\\'))} %*`);
  lines.push('if %errorlevel% neq 0 exit /b %errorlevel%', '');

  if (input.after.length > 0) {
    lines.push('rem Post-build commands');
    for (const command of input.after) {
      lines.push(`call ${command}`, 'if %errorlevel% neq 0 exit /b %errorlevel%');
    }
    lines.push('');
  }

  lines.push('echo Build completed successfully');
  return lines.join('\r\n') + '\r\n';
}

function formatShell(input: BuildScriptInput): string {
  const lines = ['#!/bin/sh', `# Generated by cbp2clangd from project "${input.projectTitle}"`, 'set -e', ''];

  const projectDir = input.projectDirFromScript ? `/${input.projectDirFromScript}` : '';
  lines.push(`cd "$(dirname "$0")${projectDir}"`);
  if (input.toolBinDir) {
    lines.push(`export PATH="${input.toolBinDir}:$PATH"`);
  }
  lines.push('');

  if (input.before.length > 0) {
    lines.push('# Pre-build commands', ...input.before, '');
  }

  lines.push(`${quoteIfNeeded(input.ninjaPath ?? 'ninja')} -f ${quoteIfNeeded(input.ninjaFile)} "$@"`, '');

  if (input.after.length > 0) {
    lines.push('# Post-build commands', ...input.after, '');
  }

  lines.push('echo "Build completed successfully"');
  return lines.join('\n') + '\n';
}

/**
 * Render the wrapper script for the configured shell
 */
export function formatBuildScript(input: BuildScriptInput): string {
  switch (input.hostShell) {
    case 'cmd':
      return formatBatch(input);
    case 'sh':
      return formatShell(input);
  }
}
