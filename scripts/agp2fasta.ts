#!/usr/bin/env tsx

/**
 * Assemble FASTA sequences from an AGP file and its component FASTA
 *
 * Usage: tsx scripts/agp2fasta.ts scaffolds.agp contigs.fasta [options]
 *
 * Examples:
 *   tsx scripts/agp2fasta.ts scaffolds.agp contigs.fasta > scaffolds.fasta
 *   tsx scripts/agp2fasta.ts scaffolds.agp contigs.fasta --strict --line-width 60 -o out.fasta
 */

import { main } from "../src/cli";

process.exitCode = await main(process.argv.slice(2));
