/**
 * Tests for build-script.ts
 */
import { formatBuildScript, buildScriptName } from '../../src/formatters/build-script';
import type { BuildScriptInput } from '../../src/formatters/build-script';

const ERROR_CHECK = 'if %errorlevel% neq 0 exit /b %errorlevel%';

function input(overrides: Partial<BuildScriptInput> = {}): BuildScriptInput {
  return {
    projectTitle: 'demo',
    hostShell: 'cmd',
    projectDirFromScript: '',
    ninjaFile: 'build.ninja',
    before: [],
    after: [],
    ...overrides,
  };
}

describe('buildScriptName', () => {
  it('should follow the host shell', () => {
    expect(buildScriptName('cmd')).toBe('build.bat');
    expect(buildScriptName('sh')).toBe('build.sh');
  });
});

describe('formatBuildScript', () => {
  it('should write a batch script with CRLF line endings', () => {
    const script = formatBuildScript(
      input({
        toolBinDir: 'C:\\rv\\bin',
        projectDirFromScript: '../proj',
        ninjaFile: 'out/build.ninja',
        ninjaPath: 'C:\\Program Files\\ninja.exe',
        before: ['gen.bat'],
        after: ['objcopy -O binary app.elf app.bin'],
      })
    );

    expect(script).toBe(
      [
        '@echo off',
        'rem Generated by cbp2clangd from project "demo"',
        'setlocal',
        '',
        'cd /d "%~dp0..\\proj"',
        'set "PATH=C:\\rv\\bin;%PATH%"',
        '',
        'rem Pre-build commands',
        'call gen.bat',
        ERROR_CHECK,
        '',
        '"C:\\Program Files\\ninja.exe" -f out\\build.ninja %*',
        ERROR_CHECK,
        '',
        'rem Post-build commands',
        'call objcopy -O binary app.elf app.bin',
        ERROR_CHECK,
        '',
        'echo Build completed successfully',
        '',
      ].join('\r\n')
    );
  });

  it('should write a POSIX shell script', () => {
    const script = formatBuildScript(
      input({ hostShell: 'sh', projectDirFromScript: '..', ninjaPath: '/opt/my tools/ninja' })
    );

    expect(script).toBe(
      [
        '#!/bin/sh',
        '# Generated by cbp2clangd from project "demo"',
        'set -e',
        '',
        'cd "$(dirname "$0")/.."',
        '',
        '"/opt/my tools/ninja" -f build.ninja "$@"',
        '',
        'echo "Build completed successfully"',
        '',
      ].join('\n')
    );
  });

  it('should stop the batch script at the first failing command', () => {
    const lines = formatBuildScript(input({ before: ['a.bat', 'b.bat'] })).split('\r\n');
    expect(lines.slice(lines.indexOf('call a.bat'), lines.indexOf('call a.bat') + 4)).toEqual([
      'call a.bat',
      ERROR_CHECK,
      'call b.bat',
      ERROR_CHECK,
    ]);
  });
});
