/**
 * Built-in project converted by `cbp2clangd --test`
 */
export const SAMPLE_PROJECT_FILE_NAME = 'sample.cbp';

export const SAMPLE_PROJECT = `<?xml version="1.0" encoding="UTF-8" standalone="yes" ?>
<CodeBlocks_project_file>
  <FileVersion major="1" minor="6" />
  <Project>
    <Option title="sample" />
    <Option compiler="riscv32-v2" />
    <Build>
      <Target title="Debug">
        <Option output="build/Debug/sample.elf" prefix_auto="0" extension_auto="0" />
        <Option object_output="build/Debug/obj" />
        <Option type="1" />
        <Compiler>
          <Add option="-O0" />
          <Add option="-g" />
          <Add option="-DDEBUG" />
        </Compiler>
      </Target>
      <Target title="Release">
        <Option output="build/Release/sample.elf" prefix_auto="0" extension_auto="0" />
        <Option object_output="build/Release/obj" />
        <Option type="1" />
        <Compiler>
          <Add option="-Os" />
        </Compiler>
      </Target>
    </Build>
    <Compiler>
      <Add option="-march=rv32imac_xsample" />
      <Add option="-mabi=ilp32" />
      <Add option="-Wall" />
      <Add option="-ffunction-sections" />
      <Add directory="include" />
    </Compiler>
    <Linker>
      <Add option="-nostartfiles" />
      <Add option="-Wl,--gc-sections" />
      <Add option="-T link.ld" />
      <Add library="m" />
    </Linker>
    <Unit filename="include/board.h" />
    <Unit filename="link.ld" />
    <Unit filename="src/main.c">
      <Option compilerVar="CC" />
    </Unit>
    <Unit filename="src/startup.S" />
  </Project>
</CodeBlocks_project_file>
`;
