export * from "./units/UnitConverters";
export * from "./exceptions/SequenceErrors";
export * from "./exceptions/EmulationErrors";
export * from "./logging/LogSink";
export * from "./program/Instruction";
export * from "./program/InstructionSet";
export * from "./program/Lexer";
export * from "./program/Parser";
export * from "./program/Program";
export * from "./program/ProgramRenderer";
export * from "./program/Registers";
export * from "./assembler/MacroAssembler";
export * from "./transforms/Pass";
export * from "./transforms/MarkerShorthand";
export * from "./transforms/ProtectionMarkers";
export * from "./transforms/Overtrigger";
export * from "./transforms/LoopWrapping";
export * from "./transforms/PhaseCycling";
export * from "./transforms/ForLoops";
export * from "./transforms/LongDelays";
export * from "./transforms/WaveformFolding";
export * from "./transforms/Chirps";
export * from "./transforms/Pipeline";
export * from "./state/SequencerState";
export * from "./emulator/ExecutableProgram";
export * from "./emulator/SignalPath";
export * from "./emulator/Opcodes";
export * from "./emulator/Emulator";
export * from "./loader/BundleLoader";
export * from "./backend/SequencerBackend";
