export type ApiPropertyType =
  | 'string'
  | 'enumeration'
  | 'number'
  | 'bool'
  | 'datetime'
  | 'date'
  | 'phone_number';

/** One CSV row, trimmed. `rawOptions` is the unsplit option text. */
export interface PropertyRequest {
  readonly originalName: string;
  readonly rawType: string;
  readonly rawOptions: string;
  readonly objectTypeRaw: string;
}

export interface TypeMapping {
  readonly type: ApiPropertyType;
  readonly fieldType: string;
  readonly multiple?: boolean;
}

export interface PropertyOption {
  label: string;
  value: string;
}

export interface PropertyPayload {
  name: string;
  label: string;
  groupName: string;
  type: ApiPropertyType;
  fieldType: string;
  multiple?: boolean;
  options?: PropertyOption[];
}

export interface PropertyGroupDefinition {
  readonly id: string;
  readonly label: string;
}
