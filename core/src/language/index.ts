import {
    registerLanguageAdapter,
    getLanguageAdapter,
    getAdapterForFile,
    getAllAdapters,
    classifyLanguage,
    isLanguageId
} from "./adapterRegistry";
import { pythonAdapter } from "./pythonAdapter";
import { jsAdapter, tsAdapter } from "./jsAdapter";
import { javaAdapter } from "./javaAdapter";
import { cAdapter, cppAdapter } from "./cppAdapter";
import { goAdapter } from "./goAdapter";
import { rustAdapter } from "./rustAdapter";

// Register all language adapters
registerLanguageAdapter(pythonAdapter);
registerLanguageAdapter(jsAdapter);
registerLanguageAdapter(tsAdapter);
registerLanguageAdapter(javaAdapter);
registerLanguageAdapter(cAdapter);
registerLanguageAdapter(cppAdapter);
registerLanguageAdapter(goAdapter);
registerLanguageAdapter(rustAdapter);

export {
    getLanguageAdapter,
    getAdapterForFile,
    getAllAdapters,
    classifyLanguage,
    isLanguageId,
    registerLanguageAdapter
};
export type { LanguageAdapter, GrammarSpec, DefinitionSpec, RegexRule } from "./adapterRegistry";
