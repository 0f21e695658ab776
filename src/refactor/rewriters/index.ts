export { rewriteEntity } from './entity.js';
export { rewriteDto } from './dto.js';
export { rewriteService, ServiceRewriter } from './service.js';
export { rewriteRepository, finderMethodLines, isSearchable } from './repository.js';
export { renderInterfaceNotes, interfaceUpdateLines } from './frontend.js';
export { controllerNotes, testFileNotes } from './companions.js';
export type { JavaSource } from './java-edits.js';
export type { DtoKind } from './field-code.js';
