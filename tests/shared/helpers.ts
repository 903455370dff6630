import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const tempDirs: string[] = [];

/** Directory holding the sample sources in every supported language. */
export const SOURCES_DIR = fileURLToPath(new URL('../fixtures/sources', import.meta.url));

/**
 * Creates a temporary directory that {@link cleanupTempDirs} removes.
 * The prefix must not contain any ignore pattern used by the tests.
 */
export function makeTempDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'code-stats-'));
    tempDirs.push(dir);
    return dir;
}

export function cleanupTempDirs(): void {
    while (tempDirs.length > 0) {
        const dir = tempDirs.pop();
        if (dir && fs.existsSync(dir)) {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    }
}

/** Writes a file below `root`, creating parent directories. Returns the full path. */
export function writeSource(root: string, relativePath: string, content: string): string {
    const fullPath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
    return fullPath;
}

/**
 * Two Rust files (3 functions, 3 structs/enums) and one Python file (2 functions, 1 class).
 */
export function createControlledProject(): string {
    const root = makeTempDir();
    writeSource(root, 'file1.rs', 'fn function_one() {}\nfn function_two() {}\nstruct StructOne {}\n');
    writeSource(root, 'file2.rs', 'fn function_three() {}\nstruct StructTwo {}\nenum EnumOne {}\n');
    writeSource(root, 'script.py', 'def function_one():\n    pass\n\ndef function_two():\n    pass\n\nclass ClassOne:\n    pass\n');
    return root;
}

/**
 * A tree with one file per language spread over nested directories,
 * plus a non-code file and a `.git` directory holding Rust code.
 */
export function createMixedProject(): string {
    const root = makeTempDir();
    writeSource(root, 'src/main.rs', 'fn main() {}\nfn calculate(a: i32, b: i32) -> i32 { a + b }\nstruct Config { name: String }\n');
    writeSource(root, 'src/lib.rs', 'pub fn public_function() {}\nenum Status { Active, Inactive }\n');
    writeSource(root, 'python/main.py', 'def main():\n    pass\n\nclass Calculator:\n    def add(self, x):\n        return x\n');
    writeSource(root, 'js/app.js', 'function main() {}\nconst calculate = (a, b) => a + b;\nclass DataProcessor {\n  process(item) {}\n}\n');
    writeSource(root, 'js/types.ts', 'interface User { id: number }\nfunction getUser(id: number): User { return { id }; }\nclass UserService {\n  getUsers(): User[] { return []; }\n}\n');
    writeSource(root, 'main.go', 'package main\n\nfunc main() {}\n\ntype Config struct {\n\tName string\n}\n');
    writeSource(root, 'Main.java', 'public class Main {\n  public static void main(String[] args) {}\n}\n');
    writeSource(root, 'README.md', '# Sample project\n');
    writeSource(root, '.git/config.rs', 'fn should_be_ignored() {}\n');
    return root;
}
