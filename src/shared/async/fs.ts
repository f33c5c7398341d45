"use strict";

import * as fs from "fs";
import stripBom = require("strip-bom");

export interface DirectoryEntry {
    name: string;
    isDirectory: boolean;
}

/** The file access the symbol catalog and settings loader need. */
export interface FileSystem {
    readDirectory(dir: string): Promise<DirectoryEntry[]>;
    /** Reads a UTF-8 text file, without its byte order mark. */
    readFile(filename: string): Promise<string>;
}

export function readDirectory(dir: string): Promise<DirectoryEntry[]> {
    return new Promise((resolve, reject) => fs.readdir(dir, { withFileTypes: true }, (err, entries) => {
        if (err) {
            reject(err);
        } else {
            resolve(entries.map((e) => ({ name: e.name, isDirectory: e.isDirectory() })));
        }
    }));
}

export function readFile(filename: string): Promise<string> {
    return new Promise((resolve, reject) => fs.readFile(filename, "utf8", (err, data) => {
        if (err) { reject(err); } else { resolve(stripBom(data)); }
    }));
}

export const nodeFileSystem: FileSystem = { readDirectory, readFile };
