/**
 * Tests for converter.ts
 */
import { convert, summarize } from '../../src/core/converter';
import { resolveOptions } from '../../src/core/config';
import { StructuralParseError } from '../../src/core/errors';
import { SAMPLE_PROJECT } from '../../src/cli/sample-project';
import { LinkerType, TargetType } from '../../src/types';
import type { ConvertOptions } from '../../src/types';

const PROJECT_DIR = '/work/sample';

function options(overrides: Partial<ConvertOptions> = {}): ConvertOptions {
  return { ...resolveOptions(), ...overrides };
}

function artifact(result: ReturnType<typeof convert>, fileName: string): string {
  return result.artifacts.find(candidate => candidate.fileName === fileName)?.content ?? '';
}

describe('convert', () => {
  it('should render every artifact in order', () => {
    const result = convert({ content: SAMPLE_PROJECT, projectDir: PROJECT_DIR, options: options() });

    expect(result.artifacts.map(a => a.fileName)).toEqual([
      'compile_commands.json',
      '.clangd',
      'build.ninja',
      'build.bat',
    ]);
    expect(result.activeTargets).toEqual(['Debug']);
    expect(result.warnings).toEqual([]);
  });

  it('should build the compilation database for the active target', () => {
    const result = convert({ content: SAMPLE_PROJECT, projectDir: PROJECT_DIR, options: options() });

    expect(result.compileCommands).toHaveLength(2);
    expect(result.compileCommands[0]).toEqual({
      directory: PROJECT_DIR,
      arguments: [
        'riscv32-elf-gcc',
        '-march=rv32imac_xsample',
        '-mabi=ilp32',
        '-Wall',
        '-ffunction-sections',
        '-O0',
        '-g',
        '-DDEBUG',
        '-Iinclude',
        '-c',
        'src/main.c',
        '-o',
        'build/Debug/obj/src/main.o',
      ],
      file: 'src/main.c',
      output: 'build/Debug/obj/src/main.o',
    });
    expect(result.compileCommands[1].arguments.slice(0, 3)).toEqual([
      'riscv32-elf-gcc',
      '-x',
      'assembler-with-cpp',
    ]);
    expect(JSON.parse(artifact(result, 'compile_commands.json'))).toEqual(result.compileCommands);
  });

  it('should pick the database flags from the selected target', () => {
    const result = convert({
      content: SAMPLE_PROJECT,
      projectDir: PROJECT_DIR,
      options: options({ target: 'Release' }),
    });
    expect(result.compileCommands[0].arguments).toContain('-Os');
    expect(result.compileCommands[0].output).toBe('build/Release/obj/src/main.o');
  });

  it('should reduce the vendor architecture for clangd', () => {
    const clangd = artifact(convert({ content: SAMPLE_PROJECT, projectDir: PROJECT_DIR, options: options() }), '.clangd');

    expect(clangd).toContain('    - "-march=rv32imac"\n  Remove:\n    - "-march=rv32imac_xsample"');
    expect(clangd).not.toContain('HeaderInsertion');
  });

  it('should build every target but default to the active one', () => {
    const result = convert({ content: SAMPLE_PROJECT, projectDir: PROJECT_DIR, options: options() });

    expect(result.graph.rules.map(rule => rule.name)).toEqual(['cc_rv32_v2', 'ascpp_rv32_v2', 'link_rv32_v2']);
    expect(result.graph.statements.map(statement => statement.outputs[0])).toEqual([
      'build/Debug/obj/src/main.o',
      'build/Debug/obj/src/startup.o',
      'build/Debug/sample.elf',
      'build/Release/obj/src/main.o',
      'build/Release/obj/src/startup.o',
      'build/Release/sample.elf',
      'Debug',
      'Release',
    ]);
    expect(result.graph.defaults).toEqual(['build/Debug/sample.elf']);
    expect(artifact(result, 'build.ninja')).toContain('\ndefault build/Debug/sample.elf\n');
  });

  it('should write a batch script next to the project', () => {
    const result = convert({ content: SAMPLE_PROJECT, projectDir: PROJECT_DIR, options: options() });

    expect(artifact(result, 'build.bat')).toBe(
      [
        '@echo off',
        'rem Generated by cbp2clangd from project "sample"',
        'setlocal',
        '',
        'cd /d "%~dp0"',
        '',
        'ninja -f build.ninja %*',
        'if %errorlevel% neq 0 exit /b %errorlevel%',
        '',
        'echo Build completed successfully',
        '',
      ].join('\r\n')
    );
  });

  it('should point the script back at the project from another output directory', () => {
    const result = convert({
      content: SAMPLE_PROJECT,
      projectDir: PROJECT_DIR,
      outputDir: `${PROJECT_DIR}/out`,
      options: options(),
    });
    const script = artifact(result, 'build.bat');

    expect(script).toContain('cd /d "%~dp0.."\r\n');
    expect(script).toContain('ninja -f out\\build.ninja %*\r\n');
  });

  it('should write a shell script with extra commands', () => {
    const content = `<?xml version="1.0" encoding="UTF-8" standalone="yes" ?>
<CodeBlocks_project_file>
  <FileVersion major="1" minor="6" />
  <Project>
    <Option title="demo" />
    <Option compiler="riscv32-v2" />
    <Build>
      <Target title="Debug">
        <Option output="app.elf" />
        <ExtraCommands><Add after="size $(TARGET_OUTPUT_FILE)" /></ExtraCommands>
      </Target>
    </Build>
    <ExtraCommands><Add before="echo $(TARGET_NAME)" /></ExtraCommands>
    <Unit filename="main.c" />
  </Project>
</CodeBlocks_project_file>`;

    const result = convert({
      content,
      projectDir: '/work/demo',
      options: options({ hostShell: 'sh', toolchainRoot: '/opt/rv32' }),
    });

    expect(result.artifacts[3].fileName).toBe('build.sh');
    expect(result.artifacts[3].content).toBe(
      [
        '#!/bin/sh',
        '# Generated by cbp2clangd from project "demo"',
        'set -e',
        '',
        'cd "$(dirname "$0")"',
        'export PATH="/opt/rv32/RV32-V2/bin:$PATH"',
        '',
        '# Pre-build commands',
        'echo Debug',
        '',
        'ninja -f build.ninja "$@"',
        '',
        '# Post-build commands',
        'size app.elf',
        '',
        'echo "Build completed successfully"',
        '',
      ].join('\n')
    );
  });

  it('should keep a literal output path', () => {
    const content = SAMPLE_PROJECT.replace('build/Debug/sample.elf', 'build/out/app.elf');
    const result = convert({ content, projectDir: PROJECT_DIR, options: options() });

    expect(result.project.targets[0].output).toBe('build/out/app.elf');
    expect(result.graph.defaults).toEqual(['build/out/app.elf']);
  });

  it('should continue with a warning for an unrecognized compiler', () => {
    const content = SAMPLE_PROJECT.replace('<Option compiler="riscv32-v2" />', '<Option compiler="mygcc" />');
    const result = convert({ content, projectDir: PROJECT_DIR, options: options() });

    expect(result.warnings).toEqual([
      { code: 'unrecognized-compiler', message: "Unknown compiler 'mygcc', falling back to riscv32-v2" },
    ]);
    expect(result.compileCommands[0].arguments[0]).toBe('riscv32-elf-gcc');
  });

  it('should change only the link rule when switching linkers', () => {
    const gcc = convert({ content: SAMPLE_PROJECT, projectDir: PROJECT_DIR, options: options() });
    const ld = convert({ content: SAMPLE_PROJECT, projectDir: PROJECT_DIR, options: options({ linker: LinkerType.Ld }) });

    expect(ld.compileCommands).toEqual(gcc.compileCommands);
    expect(ld.graph.statements[2].rule).toBe('ld_rv32_v2');
    expect(ld.graph.statements[2].variables.lib_flags).toBe(gcc.graph.statements[2].variables.lib_flags);
    expect(ld.graph.statements[2].variables.pre_flags).toBe('--gc-sections -e _start -T link.ld');
  });

  it('should log progress when verbose', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
      convert({ content: SAMPLE_PROJECT, projectDir: PROJECT_DIR, options: options({ verbose: true }) });
      expect(spy).toHaveBeenCalledWith('[cbp2clangd] Parsed project "sample": 2 target(s), 4 unit(s)');
      expect(spy).toHaveBeenCalledWith('[cbp2clangd] Active target(s): Debug');
    } finally {
      spy.mockRestore();
    }
  });

  it('should stay quiet by default', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
      convert({ content: SAMPLE_PROJECT, projectDir: PROJECT_DIR, options: options() });
      expect(spy).not.toHaveBeenCalled();
    } finally {
      spy.mockRestore();
    }
  });

  it('should fail before rendering anything on a malformed project', () => {
    expect(() =>
      convert({ content: '<CodeBlocks_project_file><Project>', projectDir: PROJECT_DIR, options: options() })
    ).toThrow(StructuralParseError);
  });
});

describe('summarize', () => {
  it('should describe each target', () => {
    const result = convert({ content: SAMPLE_PROJECT, projectDir: PROJECT_DIR, options: options() });
    const summary = summarize(result, {
      projectFile: `${PROJECT_DIR}/sample.cbp`,
      outputDir: PROJECT_DIR,
      linker: LinkerType.Gcc,
      files: [],
      dryRun: true,
    });

    expect(summary.projectTitle).toBe('sample');
    expect(summary.activeTargets).toEqual(['Debug']);
    expect(summary.targets[0]).toEqual({
      title: 'Debug',
      type: TargetType.Executable,
      output: 'build/Debug/sample.elf',
      compiler: 'riscv32-v2 (GCC 10.2.0)',
      sources: 2,
      architecture: { full: 'rv32imac_xsample', base: 'rv32imac', extension: 'xsample' },
    });
    expect(summary.rules).toBe(3);
    expect(summary.statements).toBe(8);
    expect(summary.compileCommands).toBe(2);
  });
});
