import * as ts from 'typescript';
import * as path from 'path';
import * as fs from 'fs';
import { createLogger } from '../common/logger';
import { ProjectLoadError } from '../common/errors';

const log = createLogger('ts-service');

// Whitelist of TypeScript/JavaScript file extensions
const TS_EXTENSIONS = new Set(['.ts', '.tsx', '.js', '.jsx']);

// Directories to always skip
const SKIP_DIRECTORIES = new Set([
    'node_modules',
    '.git',
    'dist',
    'out',
    'build',
    'coverage',
]);

export interface TypeScriptServiceOptions {
    /** Absolute tsconfig path; defaults to <root>/tsconfig.json when present */
    tsconfigPath?: string;
}

/**
 * Owns the ts.Program for one analyzed project. Files are discovered by our
 * own whitelist walk; tsconfig.json only contributes compiler options.
 */
export class TypeScriptService {
    private readonly program: ts.Program;
    private readonly unitFiles: ts.SourceFile[];

    constructor(public readonly root: string, private readonly options: TypeScriptServiceOptions = {}) {
        if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
            throw new ProjectLoadError(`Project root is not a directory: ${root}`);
        }

        const files = this.getTypeScriptFiles(root);
        if (files.length === 0) {
            throw new ProjectLoadError(`No TypeScript/JavaScript files found under ${root}`);
        }

        this.program = ts.createProgram(files, this.loadCompilerOptions());
        const rootNames = new Set(files.map(f => path.resolve(f)));
        this.unitFiles = this.program.getSourceFiles()
            .filter(sf => !sf.isDeclarationFile && rootNames.has(path.resolve(sf.fileName)));

        log.debug('Program created', { files: files.length, root });
    }

    public getProgram(): ts.Program {
        return this.program;
    }

    /** Source files that make up the analyzed unit, in discovery order. */
    public getUnitFiles(): readonly ts.SourceFile[] {
        return this.unitFiles;
    }

    /**
     * Load compiler options through TypeScript's own config parsing so enum
     * values (module, moduleResolution, jsx) convert correctly.
     */
    private loadCompilerOptions(): ts.CompilerOptions {
        const defaultOptions: ts.CompilerOptions = {
            target: ts.ScriptTarget.ES2020,
            module: ts.ModuleKind.CommonJS,
            moduleResolution: ts.ModuleResolutionKind.Node10,
            allowJs: true,
            esModuleInterop: true,
            skipLibCheck: true,
            noEmit: true,
        };

        const tsconfigPath = this.options.tsconfigPath ?? path.join(this.root, 'tsconfig.json');
        if (!fs.existsSync(tsconfigPath)) {
            if (this.options.tsconfigPath) {
                throw new ProjectLoadError(`tsconfig not found: ${tsconfigPath}`);
            }
            log.debug('No tsconfig.json found, using defaults');
            return defaultOptions;
        }

        const configFile = ts.readConfigFile(tsconfigPath, (filePath) => fs.readFileSync(filePath, 'utf8'));
        if (configFile.error) {
            throw new ProjectLoadError(
                `Error reading ${tsconfigPath}: ${ts.flattenDiagnosticMessageText(configFile.error.messageText, '\n')}`
            );
        }

        const parsed = ts.parseJsonConfigFileContent(
            configFile.config,
            {
                readFile: (filePath) => fs.readFileSync(filePath, 'utf8'),
                readDirectory: () => [], // We don't want TS to discover files
                useCaseSensitiveFileNames: true,
                fileExists: (filePath) => fs.existsSync(filePath),
            },
            path.dirname(tsconfigPath)
        );

        // "No inputs were found" is expected: file discovery is ours
        const realErrors = parsed.errors.filter(e =>
            !ts.flattenDiagnosticMessageText(e.messageText, '').includes('No inputs were found'));
        if (realErrors.length > 0) {
            log.warn('tsconfig parse errors', {
                tsconfig: tsconfigPath,
                errors: realErrors.map(e => ts.flattenDiagnosticMessageText(e.messageText, '\n')).join('; '),
            });
        }

        return {
            ...defaultOptions,
            ...parsed.options,
            skipLibCheck: true,
            noEmit: true,
        };
    }

    /**
     * Whitelist-based file discovery. Hidden entries, build output and
     * declaration files are skipped.
     */
    private getTypeScriptFiles(dir: string, fileList: string[] = []): string[] {
        let entries: fs.Dirent[];
        try {
            entries = fs.readdirSync(dir, { withFileTypes: true });
        } catch (err) {
            throw new ProjectLoadError(`Cannot read directory ${dir}`, err);
        }

        for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
            if (entry.name.startsWith('.') || SKIP_DIRECTORIES.has(entry.name)) {
                continue;
            }

            const fullPath = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                this.getTypeScriptFiles(fullPath, fileList);
            } else if (entry.isFile() && TS_EXTENSIONS.has(path.extname(entry.name).toLowerCase()) && !entry.name.endsWith('.d.ts')) {
                fileList.push(fullPath);
            }
        }

        return fileList;
    }
}
