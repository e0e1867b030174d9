export interface GeneratedDocumentationDto {
  generated_documentation: string;
}
