/**
 * @fileoverview Parameter translators
 *
 * A translator renders parameter values as literal assignments in one kernel
 * language, and optionally reads declared parameters back out of a
 * parameters cell. Translators are looked up by kernel name first, then by
 * language.
 *
 * @packageDocumentation
 */

import { FloatParameter, type ParameterValue, type Parameters } from '../notebook/types.js';
import { ParameterError } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';

// ============================================================================
// TYPES
// ============================================================================

/** A parameter declared in a notebook's parameters cell. */
export interface ParameterDeclaration {
  name: string;
  /** Annotation or `# type:` comment, null when the source gives none */
  inferredTypeName: string | null;
  /** Default value as written in the source */
  default: string;
  help: string;
}

type ParameterMapping = { [key: string]: ParameterValue };

// ============================================================================
// BASE TRANSLATOR
// ============================================================================

export abstract class Translator {
  abstract readonly language: string;
  readonly supportsInspection: boolean = false;

  translate(value: ParameterValue): string {
    if (value === null) return this.translateNull();
    if (typeof value === 'string') return this.translateString(value);
    if (typeof value === 'boolean') return this.translateBoolean(value);
    if (typeof value === 'number') return this.translateNumber(value);
    if (value instanceof FloatParameter) return this.translateFloat(value);
    if (Array.isArray(value)) return this.translateList(value);
    return this.translateMapping(value);
  }

  protected translateString(value: string): string {
    return `"${escapeDoubleQuoted(value)}"`;
  }

  protected translateNumber(value: number): string {
    return String(value);
  }

  protected translateFloat(value: FloatParameter): string {
    const rendered = this.translateNumber(value.value);
    return /^-?\d+$/.test(rendered) ? `${rendered}.0` : rendered;
  }

  protected abstract translateNull(): string;
  protected abstract translateBoolean(value: boolean): string;
  protected abstract translateList(value: ParameterValue[]): string;
  protected abstract translateMapping(value: ParameterMapping): string;

  comment(text: string): string {
    return `# ${text}`;
  }

  assign(name: string, renderedValue: string): string {
    return `${name} = ${renderedValue}`;
  }

  /** Header comment followed by one assignment per parameter, in insertion order. */
  codify(parameters: Parameters, header = 'Parameters'): string {
    const lines = [this.comment(header)];
    for (const [name, value] of Object.entries(parameters)) {
      lines.push(this.assign(name, this.translate(value)));
    }
    return `${lines.join('\n')}\n`;
  }

  /** Declared parameters in a parameters cell source. */
  inspect(_source: string): ParameterDeclaration[] {
    logWarning(`Parameter inference is not supported for ${this.language} notebooks`);
    return [];
  }
}

export function escapeDoubleQuoted(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
}

// ============================================================================
// PYTHON
// ============================================================================

const PYTHON_PARAMETER_PATTERN =
  /^(?<target>\w[\w_]*)\s*(:\s*["']?(?<annotation>\w[\w_[\],\s]*)["']?\s*)?=\s*(?<value>.*?)(\s*#\s*(type:\s*(?<typeComment>[^\s]*)\s*)?(?<help>.*))?$/;

/**
 * Joins the lines of one (possibly multi-line) definition. Comments are kept
 * only on the last line, where they become the parameter's help.
 */
function flattenDefinition(lines: string[]): string {
  let flat = '';
  lines.forEach((line, index) => {
    if (index < lines.length - 1) {
      const commentAt = line.indexOf('#');
      flat += (commentAt === -1 ? line : line.slice(0, commentAt)).trim();
    } else {
      flat += line.trim();
    }
  });
  return flat;
}

export class PythonTranslator extends Translator {
  readonly language = 'python';
  override readonly supportsInspection = true;

  protected translateNull(): string {
    return 'None';
  }

  protected translateBoolean(value: boolean): string {
    return value ? 'True' : 'False';
  }

  protected override translateNumber(value: number): string {
    if (Number.isNaN(value)) return "float('nan')";
    if (value === Infinity) return "float('inf')";
    if (value === -Infinity) return "float('-inf')";
    return String(value);
  }

  protected translateList(value: ParameterValue[]): string {
    return `[${value.map((item) => this.translate(item)).join(', ')}]`;
  }

  protected translateMapping(value: ParameterMapping): string {
    const entries = Object.entries(value).map(([key, item]) => `${this.translateString(key)}: ${this.translate(item)}`);
    return `{${entries.join(', ')}}`;
  }

  override inspect(source: string): ParameterDeclaration[] {
    // Dicts and lists may span lines, so lines are grouped by the assignment
    // that opens them. Blank and comment-only lines are skipped.
    const groups: string[][] = [];
    let current: string[] = [];
    source.split(/\r?\n/).forEach((line, index) => {
      const trimmed = line.trim();
      if (trimmed.length === 0 || trimmed.startsWith('#')) return;

      const equalsCount = line.split('=').length - 1;
      if (equalsCount > 0) {
        groups.push(current);
        current = [];
        if (equalsCount > 1) {
          logWarning(`Unable to parse line ${index + 1} '${line}'.`);
          return;
        }
      }
      current.push(line);
    });
    groups.push(current);

    const declarations: ParameterDeclaration[] = [];
    for (const group of groups) {
      const definition = flattenDefinition(group);
      if (definition.length === 0) continue;
      const match = PYTHON_PARAMETER_PATTERN.exec(definition);
      const fields = match?.groups;
      if (!fields?.target) continue;
      declarations.push({
        name: fields.target.trim(),
        inferredTypeName: (fields.annotation ?? fields.typeComment)?.trim() || null,
        default: (fields.value ?? '').trim(),
        help: (fields.help ?? '').trim(),
      });
    }
    return declarations;
  }
}

// ============================================================================
// R
// ============================================================================

export class RTranslator extends Translator {
  readonly language = 'r';

  protected translateNull(): string {
    return 'NULL';
  }

  protected translateBoolean(value: boolean): string {
    return value ? 'TRUE' : 'FALSE';
  }

  protected override translateNumber(value: number): string {
    if (Number.isNaN(value)) return 'NaN';
    if (value === Infinity) return 'Inf';
    if (value === -Infinity) return '-Inf';
    return String(value);
  }

  protected translateList(value: ParameterValue[]): string {
    return `list(${value.map((item) => this.translate(item)).join(', ')})`;
  }

  protected translateMapping(value: ParameterMapping): string {
    const entries = Object.entries(value).map(([key, item]) => `${this.translateString(key)} = ${this.translate(item)}`);
    return `list(${entries.join(', ')})`;
  }

  // Leading underscores are not legal in R names.
  override assign(name: string, renderedValue: string): string {
    return `${name.replace(/^_+/, '')} = ${renderedValue}`;
  }
}

// ============================================================================
// JULIA
// ============================================================================

export class JuliaTranslator extends Translator {
  readonly language = 'julia';

  protected translateNull(): string {
    return 'nothing';
  }

  protected translateBoolean(value: boolean): string {
    return value ? 'true' : 'false';
  }

  protected override translateNumber(value: number): string {
    if (Number.isNaN(value)) return 'NaN';
    if (value === Infinity) return 'Inf';
    if (value === -Infinity) return '-Inf';
    return String(value);
  }

  protected translateList(value: ParameterValue[]): string {
    return `[${value.map((item) => this.translate(item)).join(', ')}]`;
  }

  protected translateMapping(value: ParameterMapping): string {
    const entries = Object.entries(value).map(([key, item]) => `${this.translateString(key)} => ${this.translate(item)}`);
    return `Dict(${entries.join(', ')})`;
  }
}

// ============================================================================
// BASH
// ============================================================================

export class BashTranslator extends Translator {
  readonly language = 'bash';

  protected override translateString(value: string): string {
    return `'${value.replace(/'/g, `'"'"'`)}'`;
  }

  protected translateNull(): string {
    return "''";
  }

  protected translateBoolean(value: boolean): string {
    return value ? 'true' : 'false';
  }

  protected translateList(value: ParameterValue[]): string {
    return `(${value.map((item) => this.translate(item)).join(' ')})`;
  }

  protected translateMapping(_value: ParameterMapping): string {
    throw new ParameterError('untranslatable', 'Bash parameters cannot hold mappings');
  }

  override assign(name: string, renderedValue: string): string {
    return `${name}=${renderedValue}`;
  }
}

// ============================================================================
// JAVASCRIPT
// ============================================================================

export class JavaScriptTranslator extends Translator {
  readonly language = 'javascript';

  protected override translateString(value: string): string {
    return JSON.stringify(value);
  }

  protected translateNull(): string {
    return 'null';
  }

  protected translateBoolean(value: boolean): string {
    return value ? 'true' : 'false';
  }

  protected translateList(value: ParameterValue[]): string {
    return `[${value.map((item) => this.translate(item)).join(', ')}]`;
  }

  protected translateMapping(value: ParameterMapping): string {
    const entries = Object.entries(value).map(([key, item]) => `${this.translateString(key)}: ${this.translate(item)}`);
    return `{${entries.join(', ')}}`;
  }

  override comment(text: string): string {
    return `// ${text}`;
  }

  // `var` so a re-run of the cell in the same context does not throw.
  override assign(name: string, renderedValue: string): string {
    return `var ${name} = ${renderedValue};`;
  }
}

// ============================================================================
// REGISTRY
// ============================================================================

export class TranslatorRegistry {
  private byLanguage = new Map<string, Translator>();
  private byKernel = new Map<string, Translator>();

  register(translator: Translator, kernelNames: readonly string[] = []): void {
    this.byLanguage.set(translator.language.toLowerCase(), translator);
    for (const kernelName of kernelNames) {
      this.byKernel.set(kernelName.toLowerCase(), translator);
    }
  }

  /**
   * @throws ParameterError when neither the kernel nor the language has a translator
   */
  find(kernelName?: string | null, language?: string | null): Translator {
    const byKernel = kernelName ? this.byKernel.get(kernelName.toLowerCase()) : undefined;
    if (byKernel) return byKernel;
    const byLanguage = language ? this.byLanguage.get(language.toLowerCase()) : undefined;
    if (byLanguage) return byLanguage;
    throw new ParameterError(
      'no_translator',
      `No parameter translator for kernel '${kernelName ?? ''}' or language '${language ?? ''}'`,
    );
  }
}

export const translatorRegistry = new TranslatorRegistry();
translatorRegistry.register(new PythonTranslator(), ['python', 'python3', 'python2']);
translatorRegistry.register(new RTranslator(), ['ir']);
translatorRegistry.register(new JuliaTranslator());
translatorRegistry.register(new BashTranslator(), ['bash']);
translatorRegistry.register(new JavaScriptTranslator(), ['javascript', 'node', 'nodejs']);

export function findTranslator(kernelName?: string | null, language?: string | null): Translator {
  return translatorRegistry.find(kernelName, language);
}
