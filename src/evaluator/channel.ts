"use strict";

import { Writable } from "stream";

import { SexpNavigator } from "../analysis/syntax/sexpr/navigator";
import { TextBuffer } from "../analysis/workspace/document";
import { Logger, logger } from "../shared/log";
import { echoEvalCommands, evalCommand, printCommand } from "./commands";

/**
 * Sends one-line statements to a running evaluator. Nothing waits for replies; the evaluator's
 * output is someone else's business.
 */
export class EvaluatorChannel {
    private closed = false;

    constructor(private readonly input: Writable, private readonly log: Logger = logger) {
        input.on("error", (err: Error) => {
            this.log.error(`[evaluator] ${err.message}`);
            this.closed = true;
        });
        input.on("close", () => { this.closed = true; });
    }

    public get isOpen(): boolean {
        return !this.closed && !this.input.writableEnded;
    }

    public print(text: string): boolean {
        return this.send(printCommand(text));
    }

    /** @throws {Error} if the code ends inside a string or block comment. */
    public evaluate(code: string): boolean {
        return this.send(evalCommand(code));
    }

    /** @throws {Error} if the code ends inside a string or block comment. */
    public echoEvaluate(code: string): boolean {
        return echoEvalCommands(code).every((statement) => this.send(statement));
    }

    /**
     * Evaluates each top-level expression between `start` and `end`.
     * @returns The number of statements sent.
     */
    public evaluateRegion(buffer: TextBuffer, start: number, end: number): number {
        const navigator = new SexpNavigator(buffer);
        let sent = 0;
        let pos = start;
        for (let steps = 0; steps < navigator.maxSteps; steps++) {
            const sexp = navigator.forwardSexp(pos);
            if (!sexp || sexp.range.end > end) { break; }
            if (!this.evaluate(sexp.text)) { break; }
            sent++;
            pos = sexp.range.end;
        }
        return sent;
    }

    public close() {
        if (!this.closed) {
            this.closed = true;
            this.input.end();
        }
    }

    private send(statement: string): boolean {
        if (!this.isOpen) {
            this.log.warn(`[evaluator] not sent, channel is closed: ${statement}`);
            return false;
        }
        this.log.verbose(`[evaluator] ${statement}`);
        this.input.write(`${statement}\n`);
        return true;
    }
}
