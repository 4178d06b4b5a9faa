export type RuleDeclaration = {
  actions: string[];
  require?: string;
  context?: string;
  attributeCheck?: boolean;
  model?: string;
  loadMethod?: string;
};

/** Resource name -> rules, in declaration order. */
export type AccessDeclarations = Record<string, RuleDeclaration[]>;

/** Shape of one declaration file; the only string entry is `$schema`. */
export type DeclarationFile = Record<string, RuleDeclaration[] | string>;

export type CompiledDeclarations = {
  declarations: AccessDeclarations;
  sources: Array<{ resource: string; filePath: string }>;
};
