#!/usr/bin/env node
import {
  createConnection,
  TextDocuments,
  ProposedFeatures,
  InitializeParams,
  CompletionItem,
  TextDocumentSyncKind,
  InitializeResult
} from 'vscode-languageserver/node';

import { TextDocument } from 'vscode-languageserver-textdocument';
import { validate, hover, completions, resolveCompletion } from './service';

// Create a connection for the server, using Node's IPC as a transport.
// Also include all preview / proposed LSP features.
const connection = createConnection(ProposedFeatures.all);

// Create a simple text document manager.
const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

connection.onInitialize((_params: InitializeParams) => {
  const result: InitializeResult = {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      completionProvider: {
        resolveProvider: true
      },
      hoverProvider: true
    }
  };
  return result;
});

// Emitted when a document is first opened and whenever its content changes.
documents.onDidChangeContent(change => {
  const doc = change.document;
  void connection.sendDiagnostics({ uri: doc.uri, diagnostics: validate(doc.getText()) });
});

connection.onCompletion((): CompletionItem[] => completions());

connection.onCompletionResolve((item: CompletionItem): CompletionItem => resolveCompletion(item));

connection.onHover((params) => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return null;
  return hover(doc.getText(), params.position.line, params.position.character);
});

// Make the text document manager listen on the connection
// for open, change and close text document events
documents.listen(connection);

// Listen on the connection
connection.listen();
