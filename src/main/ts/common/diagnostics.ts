export enum DiagnosticSeverity {
    Error,
    Warning,
    Info,
    Hint
}

export interface Diagnostic {
    severity: DiagnosticSeverity;
    message: string;
    // Name of the class or layout the entry is about.
    subject?: string;
}

export interface DiagnosticReporterOptions {
    echo?: boolean;
}

export class DiagnosticReporter {
    private diagnostics: Diagnostic[] = [];
    private readonly echo: boolean;

    constructor(options: DiagnosticReporterOptions = {}) {
        this.echo = options.echo ?? true;
    }

    report(diagnostic: Diagnostic) {
        this.diagnostics.push(diagnostic);
        if (this.echo) this.printDiagnostic(diagnostic);
    }

    private printDiagnostic(diagnostic: Diagnostic) {
        console[diagnostic.severity === DiagnosticSeverity.Error ? "error" : "log"](
            formatDiagnostic(diagnostic)
        );
    }

    getDiagnostics(): Diagnostic[] {
        return this.diagnostics;
    }

    clear() {
        this.diagnostics = [];
    }
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
    const severityStr = DiagnosticSeverity[diagnostic.severity].toUpperCase();
    let message = `[${severityStr}] ${diagnostic.message}`;

    if (diagnostic.subject) {
        message = `[${severityStr}] ${diagnostic.subject} - ${diagnostic.message}`;
    }

    return message;
}
