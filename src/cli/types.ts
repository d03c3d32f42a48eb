export interface StartCommandOptions {
  auto?: boolean;
  smoke?: string;
  seed?: boolean;
}

export interface StatusCommandOptions {
  json?: boolean;
}

export interface ListCommandOptions {
  status?: string;
  from?: string;
  to?: string;
  limit?: string;
  export?: string;
  json?: boolean;
}

export interface ShowCommandOptions {
  code?: boolean;
  history?: boolean;
  diff?: boolean;
  errors?: boolean;
  json?: boolean;
}

export interface SearchCommandOptions {
  category?: string;
  topK?: string;
  json?: boolean;
}

export interface AddCommandOptions {
  category: string;
  id?: string;
  type?: string;
  tags?: string;
}
